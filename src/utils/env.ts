//
//
//

/**
 * Reads a variable, treating an empty string as unset.
 */
export function readVariable(env: NodeJS.ProcessEnv, name: string): string | undefined {
    const value = env[name];
    return value === undefined || value.trim() === "" ? undefined : value.trim();
}

/**
 * Parses "true"/"false" style values. Returns null for anything else.
 */
export function parseBoolean(value: string): boolean | null {
    switch (value.toLowerCase()) {
        case "1":
        case "true":
        case "yes":
        case "on":
            return true;
        case "0":
        case "false":
        case "no":
        case "off":
            return false;
        default:
            return null;
    }
}

/**
 * Parses a base-10 integer made only of digits. Returns null otherwise.
 */
export function parseNonNegativeInteger(value: string): number | null {
    if (!/^\d+$/.test(value)) {
        return null;
    }
    const parsed = parseInt(value, 10);
    return Number.isSafeInteger(parsed) ? parsed : null;
}
