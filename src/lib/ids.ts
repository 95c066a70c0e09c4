import { v4 as uuidv4 } from 'uuid';

function hex(length: number): string {
    return uuidv4().replace(/-/g, '').slice(0, length);
}

/** Short prefixed identifier, e.g. `v_3f9a0c12b7de`. */
export function uid(prefix: string, length = 12): string {
    return `${prefix}_${hex(length)}`;
}

/** Device API key: the full 122 random bits of a v4 UUID. */
export function mintApiKey(): string {
    return uid('key', 32);
}
