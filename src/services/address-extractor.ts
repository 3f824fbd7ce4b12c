// Word characters in the Unicode sense, so non-ASCII local parts and IDN domains match whole
const EMAIL_PATTERN = /[\p{L}\p{M}\p{N}_.-]+@[\p{L}\p{M}\p{N}_.-]+\.[\p{L}\p{M}\p{N}_]+/u;

/**
 * Pull the first address-shaped substring out of a free-form field,
 * e.g. `Jane Doe <jane@example.com>`. Syntax only.
 */
export function extractAddress(value: string | null | undefined): string | null {
    if (!value) {
        return null;
    }
    const match = EMAIL_PATTERN.exec(value.trim());
    return match ? match[0] : null;
}
