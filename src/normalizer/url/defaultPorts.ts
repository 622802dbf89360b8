// Order matters for schemeForPort(): the first scheme listed for a port wins.
export const DEFAULT_PORTS: Readonly<Record<string, string>> = Object.freeze({
  ftp: '21',
  gopher: '70',
  http: '80',
  https: '443',
  news: '119',
  nntp: '119',
  snews: '563',
  snntp: '563',
  telnet: '23',
  ws: '80',
  wss: '443',
});

export function defaultPortFor(scheme: string): string | undefined {
  return Object.hasOwn(DEFAULT_PORTS, scheme) ? DEFAULT_PORTS[scheme] : undefined;
}

export function schemeForPort(port: string): string | undefined {
  const match = Object.entries(DEFAULT_PORTS).find(([, defaultPort]) => defaultPort === port);
  return match?.[0];
}
