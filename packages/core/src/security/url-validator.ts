/**
 * URL Validation
 *
 * Checks that a URL handed to a crawling provider is absolute, uses an allowed
 * protocol and (by default) does not point at internal infrastructure:
 * - Internal IP addresses (10.0.0.0/8, 172.16.0.0/12, 192.168.0.0/16)
 * - Loopback and unspecified addresses (127.0.0.0/8, 0.0.0.0/8, ::1, localhost, *.localhost)
 * - Cloud metadata services (AWS, GCP, Aliyun, etc.)
 * - Link-local addresses (169.254.0.0/16)
 */

const BLOCKED_IP_RANGES = [
  { start: '0.0.0.0', end: '0.255.255.255' },
  { start: '127.0.0.0', end: '127.255.255.255' },
  { start: '10.0.0.0', end: '10.255.255.255' },
  { start: '172.16.0.0', end: '172.31.255.255' },
  { start: '192.168.0.0', end: '192.168.255.255' },
  { start: '169.254.0.0', end: '169.254.255.255' },
];

const BLOCKED_METADATA_HOSTS = [
  '169.254.169.254', // AWS
  '169.254.169.253', // AWS (Windows)
  'metadata.google.internal',
  'metadata',
  '100.100.100.200', // Aliyun
  'instance-data',
];

const BLOCKED_IPV6_PATTERNS = [
  /^::1$/,
  /^::$/,
  /^::ffff:/i,
  /^fe80:/i,
  /^fec0:/i,
  /^fc00:/i,
  /^fd00:/i,
  /^ff00:/i,
  /^0:0:0:0:0:0:0:1$/i,
];

export interface UrlValidationOptions {
  /** Block internal, loopback and metadata hosts (default: true) */
  blockInternal?: boolean;
  /** Allowed protocols (default: ['http:', 'https:']) */
  allowedProtocols?: string[];
}

function ipToNumber(ip: string): number {
  const parts = ip.split('.');
  if (parts.length !== 4 || parts.some((p) => !/^\d{1,3}$/.test(p) || Number(p) > 255)) {
    return -1;
  }
  // Unsigned so ranges above 128.0.0.0 compare correctly
  return parts.reduce((acc, part) => acc * 256 + Number(part), 0);
}

function isIpInBlockedRange(ip: string): boolean {
  const ipNum = ipToNumber(ip);
  if (ipNum === -1) return false;

  return BLOCKED_IP_RANGES.some((range) => {
    return ipNum >= ipToNumber(range.start) && ipNum <= ipToNumber(range.end);
  });
}

function isIPv6Blocked(hostname: string): boolean {
  const addr = hostname.replace(/^\[|\]$/g, '');
  return BLOCKED_IPV6_PATTERNS.some(pattern => pattern.test(addr));
}

/**
 * Validate a URL string
 *
 * @throws Error if URL is invalid, uses a blocked protocol, or points to a blocked host
 * @returns The parsed URL
 *
 * @example
 * ```typescript
 * validateUrl('https://example.com/docs');          // ok
 * validateUrl('http://169.254.169.254/latest');     // throws
 * validateUrl('http://localhost:3000', { blockInternal: false }); // ok
 * ```
 */
export function validateUrl(
  urlString: string,
  options: UrlValidationOptions = {}
): URL {
  const {
    blockInternal = true,
    allowedProtocols = ['http:', 'https:'],
  } = options;

  let url: URL;

  try {
    url = new URL(urlString);
  } catch {
    throw new Error(`Invalid URL: ${urlString}`);
  }

  if (!allowedProtocols.includes(url.protocol)) {
    throw new Error(
      `Blocked protocol: ${url.protocol}. Allowed: ${allowedProtocols.join(', ')}`
    );
  }

  if (blockInternal) {
    // "localhost." and "localhost" name the same host
    const hostname = url.hostname.replace(/\.$/, '');

    if (BLOCKED_METADATA_HOSTS.includes(hostname)) {
      throw new Error(`Blocked metadata service: ${hostname}`);
    }

    if (hostname.includes(':') || hostname.startsWith('[')) {
      if (isIPv6Blocked(hostname)) {
        throw new Error(`Blocked IPv6 address: ${hostname}`);
      }
    }

    if (isIpInBlockedRange(hostname)) {
      throw new Error(`Blocked internal IP address: ${hostname}`);
    }

    if (hostname === 'localhost' || hostname.endsWith('.localhost')) {
      throw new Error('Blocked localhost access');
    }
  }

  return url;
}
