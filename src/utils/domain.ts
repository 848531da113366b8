import psl from 'psl';

export function extractHost(url: string): string | null {
  try {
    const host = new URL(url).hostname.toLowerCase();
    return host || null;
  } catch {
    return null;
  }
}

/**
 * eTLD+1 for a hostname ("blog.example.co.uk" -> "example.co.uk").
 * Hosts the public suffix list cannot place (IP addresses, localhost) are returned unchanged.
 */
export function registrableDomain(host: string): string {
  const normalized = host.toLowerCase();
  return psl.get(normalized) ?? normalized;
}
