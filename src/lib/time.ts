const ISO_INSTANT =
    /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/i;

/**
 * Parse an ISO-8601 date or date-time. A trailing `Z` means UTC; a value
 * without a zone designator is read as UTC too.
 */
export function parseInstant(value: string): Date {
    const trimmed = value.trim().toUpperCase();
    const match = ISO_INSTANT.exec(trimmed);
    if (!match) {
        throw new Error(`Invalid datetime: ${value}`);
    }

    let normalized = trimmed.replace(' ', 'T');
    const zone = match[1];
    if (normalized.includes('T')) {
        if (zone === undefined) {
            normalized += 'Z';
        } else if (/^[+-]\d{4}$/.test(zone)) {
            normalized = `${normalized.slice(0, -zone.length)}${zone.slice(0, 3)}:${zone.slice(3)}`;
        }
    }

    const parsed = new Date(normalized);
    if (isNaN(parsed.getTime())) {
        throw new Error(`Invalid datetime: ${value}`);
    }
    return parsed;
}
