/**
 * Internet Checksum (RFC 1071).
 * 16-bit one's complement sum over adjacent octet pairs, an odd trailing octet is padded as `[A, 0]`.
 * Parts are summed as if concatenated; every part except the last must have an even length.
 * @returns the one's complement of the sum
 */
export function calculateChecksum(...parts: Uint8Array[]): number {
    let sum = 0;

    for (let buf of parts) {
        let i = 0;
        for (; i + 1 < buf.length; i += 2) {
            sum += (buf[i] << 8) | buf[i + 1];
        }

        if (i < buf.length) {
            sum += buf[i] << 8;
        }

        // fold carries back into 16 bits
        while (sum > 0xffff) {
            sum = (sum & 0xffff) + (sum >>> 16);
        }
    }

    return ~sum & 0xffff;
}
