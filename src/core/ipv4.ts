/**
 * Dotted-quad IPv4 validation
 */

const SEGMENT = /^[0-9]{1,3}$/;

/**
 * True for `a.b.c.d` with four 1-3 digit segments in 0..255.
 * Leading zeros are accepted; anything containing `:` is rejected outright.
 */
export function isIPv4(value: string): boolean {
  if (value.includes(':')) {
    return false;
  }

  const segments = value.split('.');
  if (segments.length !== 4) {
    return false;
  }

  return segments.every((segment) => SEGMENT.test(segment) && Number(segment) <= 255);
}
