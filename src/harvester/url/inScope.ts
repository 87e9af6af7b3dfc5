/**
 * True when `hostname` is the anchor host itself or one of its subdomains. The rule is one-way:
 * the anchor's parent domains and unrelated hosts that merely start with it are out of scope.
 */
export function inScope(hostname: string, anchorHostname: string): boolean {
  const host = hostname.toLowerCase();
  const anchor = anchorHostname.toLowerCase();

  if (host.length === 0 || anchor.length === 0) {
    return false;
  }

  return host === anchor || host.endsWith(`.${anchor}`);
}
