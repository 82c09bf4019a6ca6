const LOOPBACK_HOSTS = ['localhost', '127.0.0.1', '::1'];

/**
 * Split "host:port" or "[v6host]:port". Returns null when the input has no
 * port or an unbracketed host with colons.
 */
export function splitHostPort(addr: string): { host: string; port: string } | null {
  if (addr.startsWith('[')) {
    const end = addr.indexOf(']');
    if (end < 0 || addr[end + 1] !== ':') {
      return null;
    }
    return { host: addr.slice(1, end), port: addr.slice(end + 2) };
  }

  const colon = addr.lastIndexOf(':');
  if (colon < 0) {
    return null;
  }
  const host = addr.slice(0, colon);
  if (host.includes(':')) {
    return null;
  }
  return { host, port: addr.slice(colon + 1) };
}

/**
 * Whether a remote address points at this machine, in which case the proxy
 * talks plain http to it.
 */
export function isLoopbackAddr(addr: string): boolean {
  const parts = splitHostPort(addr);
  if (!parts) {
    return false;
  }
  return LOOPBACK_HOSTS.includes(parts.host);
}
