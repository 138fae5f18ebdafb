/**
 * Address Classifier - Heuristic recognition of IP literals and host tokens
 *
 * A token that is not recognised as an address falls back to a status
 * query; only recognised addresses reach the lookup service.
 */

// Domains of web chat gateways that encode the client IP as hex in the ident
const WEB_GATEWAY_DOMAINS = ['mibbit.com'];

const HEX_HOST_PATTERN = /^[~+\-^=]?([a-f0-9]{8})$/i;
const HOSTNAME_PATTERN = /^.+\.[a-z]+$/i;
const ADDRESS_CHARSET_PATTERN = /^[a-f0-9.:]{3,45}$/i;

export function isWebGatewayHost(value: string): boolean {
  const lower = value.toLowerCase();
  return WEB_GATEWAY_DOMAINS.some(
    (domain) => lower.endsWith(`.${domain}`) && lower.length > domain.length + 1
  );
}

export function isHexHost(value: string): boolean {
  return HEX_HOST_PATTERN.test(value);
}

export function looksLikeHostname(value: string): boolean {
  return HOSTNAME_PATTERN.test(value);
}

/**
 * IPv4 or IPv6 literal, roughly. Requires a '.' or ':' so that short
 * all-hex nicks like "DEAF" are not taken for addresses.
 */
export function looksLikeAddress(value: string): boolean {
  if (!ADDRESS_CHARSET_PATTERN.test(value)) {
    return false;
  }

  if (!value.includes('.') && !value.includes(':')) {
    return false;
  }

  return !looksLikeHostname(value);
}

/**
 * Decode a hex host token such as "~7f000001" to "127.0.0.1".
 * Returns an empty string when the token is not a hex host.
 */
export function hexToIPv4(value: string): string {
  const match = HEX_HOST_PATTERN.exec(value);
  if (!match) {
    return '';
  }

  const hex = match[1];
  const octets: number[] = [];
  for (let i = 0; i < 8; i += 2) {
    octets.push(parseInt(hex.substring(i, i + 2), 16));
  }

  return octets.join('.');
}

/**
 * Split "user@host" at the first '@'. A value without '@' is all user.
 */
export function splitUserHost(value: string): { user: string; host: string } {
  const at = value.indexOf('@');
  if (at === -1) {
    return { user: value, host: '' };
  }

  return { user: value.substring(0, at), host: value.substring(at + 1) };
}
