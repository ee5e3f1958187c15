export interface ProxySettings {
  host: string;
  port: number;
  username?: string;
  password?: string;
}

/** Playwright's proxy option shape */
export interface PlaywrightProxy {
  server: string;
  username?: string;
  password?: string;
}

const HOST_PATTERN = /^[a-zA-Z0-9](?:[a-zA-Z0-9.-]*[a-zA-Z0-9])?$/;

/**
 * Parses `host:port` or `host:port:user:pass`. Returns null for anything else.
 */
export function parseProxy(proxy: string): ProxySettings | null {
  const parts = proxy.trim().split(':');
  if (parts.length !== 2 && parts.length !== 4) {
    return null;
  }

  const [host, portText, username, password] = parts;
  if (!HOST_PATTERN.test(host) || !/^\d{1,5}$/.test(portText)) {
    return null;
  }

  const port = Number(portText);
  if (port < 1 || port > 65535) {
    return null;
  }

  if (parts.length === 2) {
    return { host, port };
  }
  if (!username || !password) {
    return null;
  }
  return { host, port, username, password };
}

export function toPlaywrightProxy(settings: ProxySettings): PlaywrightProxy {
  const proxy: PlaywrightProxy = { server: `http://${settings.host}:${settings.port}` };
  if (settings.username && settings.password) {
    proxy.username = settings.username;
    proxy.password = settings.password;
  }
  return proxy;
}
