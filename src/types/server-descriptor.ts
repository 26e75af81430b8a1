export interface ServerDescriptor {
  name: string;            // Display name (unique)
  address: string;         // host:port of the RCON endpoint
  secret: string;          // RCON password
  containerRef?: string;   // Docker container name or ID
}

/**
 * Split an RCON address into host and port
 * Example: "10.0.0.5:27015" → { host: "10.0.0.5", port: 27015 }
 */
export function parseAddress(address: string): { host: string; port: number } {
  const separator = address.lastIndexOf(':');
  if (separator <= 0 || separator === address.length - 1) {
    throw new Error(`Address must be host:port, got "${address}"`);
  }

  const host = address.slice(0, separator).replace(/^\[|\]$/g, '');
  const portText = address.slice(separator + 1);
  if (!/^\d+$/.test(portText)) {
    throw new Error(`Invalid port in address "${address}"`);
  }

  const port = parseInt(portText, 10);
  if (port < 1 || port > 65535) {
    throw new Error(`Port out of range in address "${address}"`);
  }

  return { host, port };
}

/**
 * Describe a server for the status line
 */
export function describeServer(server: ServerDescriptor): string {
  let text = `Active: ${server.name} (${server.address})`;
  if (server.containerRef) {
    text += ` | Container: ${server.containerRef}`;
  }
  return text;
}
