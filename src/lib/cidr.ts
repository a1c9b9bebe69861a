/**
 * IPv4 / CIDR helpers
 *
 * Addresses are handled as unsigned 32-bit integers.
 */

export interface Ipv4Network {
  /** Network address as an unsigned integer */
  network: number
  prefix: number
  /** Number of addresses in the block */
  size: number
}

const IPV4_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/

/**
 * Parse a dotted-quad IPv4 address. Returns null when malformed.
 */
export function parseIpv4(value: string): number | null {
  const match = IPV4_PATTERN.exec(value.trim())
  if (!match) return null

  let result = 0
  for (let i = 1; i <= 4; i++) {
    const part = match[i]
    // Reject leading zeros ("010") which some parsers read as octal
    if (part.length > 1 && part.startsWith('0')) return null
    const octet = Number(part)
    if (octet > 255) return null
    result = result * 256 + octet
  }
  return result
}

export function formatIpv4(value: number): string {
  return [
    Math.floor(value / 0x1000000) % 256,
    Math.floor(value / 0x10000) % 256,
    Math.floor(value / 0x100) % 256,
    value % 256
  ].join('.')
}

export function isIpv4(value: string): boolean {
  return parseIpv4(value) !== null
}

/**
 * Parse "a.b.c.d/n". With `strict`, host bits must be zero.
 */
export function parseCidr(value: string, options: { strict?: boolean } = {}): Ipv4Network | null {
  const [address, prefixRaw, ...rest] = value.trim().split('/')
  if (rest.length > 0 || prefixRaw === undefined || !/^\d{1,2}$/.test(prefixRaw)) return null

  const prefix = Number(prefixRaw)
  if (prefix > 32) return null

  const ip = parseIpv4(address)
  if (ip === null) return null

  const size = 2 ** (32 - prefix)
  const network = ip - (ip % size)
  if (options.strict && network !== ip) return null

  return { network, prefix, size }
}

export function isCidr(value: string): boolean {
  return parseCidr(value) !== null
}

export function formatCidr(net: Ipv4Network): string {
  return `${formatIpv4(net.network)}/${net.prefix}`
}

export function broadcastAddress(net: Ipv4Network): number {
  return net.network + net.size - 1
}

export function containsAddress(net: Ipv4Network, address: number): boolean {
  return address >= net.network && address <= broadcastAddress(net)
}

/**
 * True when the address is inside the subnet and is neither its network
 * nor its broadcast address (/31 and /32 have no reserved addresses).
 */
export function isUsableHost(net: Ipv4Network, address: number): boolean {
  if (!containsAddress(net, address)) return false
  if (net.prefix >= 31) return true
  return address !== net.network && address !== broadcastAddress(net)
}

/**
 * Two CIDR blocks intersect iff one contains the other's network address
 */
export function cidrsOverlap(a: Ipv4Network, b: Ipv4Network): boolean {
  return containsAddress(a, b.network) || containsAddress(b, a.network)
}

/**
 * Normalize "10.0.10.1/24" style interface notation into
 * { subnet: "10.0.10.0/24", gateway: "10.0.10.1" }.
 */
export function splitInterfaceCidr(value: string): { subnet: string; gateway: string } | null {
  const net = parseCidr(value)
  if (!net) return null
  const [address] = value.trim().split('/')
  return { subnet: formatCidr(net), gateway: address }
}

/**
 * Inverse of splitInterfaceCidr: "10.0.10.1/24"
 */
export function joinInterfaceCidr(subnet: string, gateway: string): string {
  const net = parseCidr(subnet)
  return net ? `${gateway}/${net.prefix}` : subnet
}
