import { logger } from '../logger.js';
import { appError, ok, Result } from '../errors.js';
import { UsAddressParser } from './us-address-parser.js';

export interface AddressComponent {
    value: string;
    label: string;
}

/**
 * Splits a free-text address into labeled components.
 * Returns null when nothing in the input is recognised as an address.
 */
export interface AddressParser {
    parse(address: string): AddressComponent[] | null;
}

export interface SanitizeOptions {
    parser?: AddressParser;
    verbose?: boolean;
}

const defaultParser = new UsAddressParser();

/**
 * Normalize an address into its component values joined by single spaces.
 */
export function sanitizeAddress(rawAddress: string, options: SanitizeOptions = {}): Result<string> {
    const { parser = defaultParser, verbose = false } = options;

    if (!rawAddress || rawAddress.trim().length === 0) {
        return appError('AddressError', `Missing address. Input provided: ${rawAddress}`);
    }

    const components = parser.parse(rawAddress);
    if (!components || components.length === 0) {
        return appError('AddressError', `Missing address components. Input provided: ${rawAddress}`, {
            reason: 'no components',
        });
    }

    const seenLabels = new Set<string>();
    const values: string[] = [];
    for (const component of components) {
        if (seenLabels.has(component.label)) {
            const parsed = values.join(' ');
            return appError('AddressError', `Error parsing address: ${parsed}, ${rawAddress}`, {
                reason: 'parse conflict',
                label: component.label,
                original: rawAddress,
                parsed,
            });
        }
        seenLabels.add(component.label);
        values.push(component.value);
    }

    const sanitized = values.join(' ');
    if (verbose) {
        logger.info(`Sanitized address: ${sanitized}`);
    }
    return ok(sanitized);
}
