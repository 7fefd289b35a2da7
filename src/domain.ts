/**
 * Remove the trailing root-zone dot of a fully-qualified name.
 *
 * - `example.com.` → `example.com`
 * - `example.com` → `example.com`
 */
export function unFqdn(name: string): string {
  if (name.endsWith('.')) {
    return name.slice(0, -1);
  }
  return name;
}

/**
 * Convert a challenge FQDN to the label OVH expects relative to its zone.
 *
 * E.g. "_acme-challenge.example.com." with zone "example.com." → "_acme-challenge"
 *      "_acme-challenge.sub.example.com" with zone "example.com" → "_acme-challenge.sub"
 *
 * When the FQDN does not contain the zone, the FQDN itself (without the
 * trailing dot) is used.
 */
export function getSubDomain(zone: string, fqdn: string): string {
  const idx = fqdn.indexOf(`.${unFqdn(zone)}`);
  if (idx !== -1) {
    return fqdn.slice(0, idx);
  }
  return unFqdn(fqdn);
}
