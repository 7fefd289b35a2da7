import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import ini from 'ini';
import { ConfigDecodeError, errorMessage } from '../errors.js';

/** Sections of the merged `ovh.conf` files, keyed by section then key */
export type OvhConfigSections = Record<string, Record<string, string>>;

/**
 * Config file locations, lowest priority first: system, user, then the
 * working directory.
 */
export function ovhConfigPaths(home: string = homedir(), cwd: string = process.cwd()): string[] {
  return ['/etc/ovh.conf', join(home, '.ovh.conf'), join(cwd, 'ovh.conf')];
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function sectionsOf(parsed: Record<string, unknown>): OvhConfigSections {
  const sections: OvhConfigSections = {};
  for (const [name, section] of Object.entries(parsed)) {
    if (typeof section !== 'object' || section === null) continue;
    const values: Record<string, string> = {};
    for (const [key, value] of Object.entries(section)) {
      if (typeof value === 'string') values[key] = value;
    }
    sections[name] = values;
  }
  return sections;
}

/**
 * Read and merge the INI files at `paths`. Later files override earlier
 * ones key by key; missing files are skipped.
 */
export async function loadOvhConfig(paths: readonly string[]): Promise<OvhConfigSections> {
  const merged: OvhConfigSections = {};
  for (const path of paths) {
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) continue;
      throw new ConfigDecodeError(`${path}: ${errorMessage(err)}`, { cause: err });
    }
    const parsed: Record<string, unknown> = ini.parse(text);
    for (const [name, values] of Object.entries(sectionsOf(parsed))) {
      merged[name] = { ...merged[name], ...values };
    }
  }
  return merged;
}
