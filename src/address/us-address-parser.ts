/// <reference path="../types/parse-address.d.ts" />
import { parseLocation } from 'parse-address';
import type { AddressComponent, AddressParser } from './sanitizer.js';

const UNPARSED_LABEL = 'unparsed';

interface LabeledToken {
    label: string;
    token: string;
    used: boolean;
}

function normalizeToken(token: string): string {
    return token.toLowerCase().replace(/[^a-z0-9#&-]/g, '');
}

export function tokenizeAddress(address: string): string[] {
    return address.split(/[\s,;]+/).filter(token => token.length > 0);
}

/**
 * US street address parser backed by parse-address.
 *
 * Every input token is kept, in input order. Tokens the library recognised carry
 * its label; consecutive tokens with the same label form one component. Tokens it
 * dropped (countries, unknown place words, spelled-out street types it abbreviated)
 * become `unparsed_<n>` runs so nothing of the address is lost.
 */
export class UsAddressParser implements AddressParser {
    parse(address: string): AddressComponent[] | null {
        const tokens = tokenizeAddress(address);
        if (tokens.length === 0) return null;

        const pool: LabeledToken[] = [];
        const parsed = parseLocation(address);
        if (parsed) {
            for (const [label, value] of Object.entries(parsed)) {
                if (typeof value !== 'string') continue;
                for (const token of tokenizeAddress(value)) {
                    pool.push({ label, token: normalizeToken(token), used: false });
                }
            }
        }

        const components: AddressComponent[] = [];
        let unparsedRuns = 0;
        let previousLabel: string | null = null;

        for (const token of tokens) {
            const normalized = normalizeToken(token);
            const match = pool.find(entry => !entry.used && entry.token === normalized);
            let label: string;
            if (match) {
                match.used = true;
                label = match.label;
            } else if (previousLabel !== null && previousLabel.startsWith(`${UNPARSED_LABEL}_`)) {
                label = previousLabel;
            } else {
                unparsedRuns++;
                label = `${UNPARSED_LABEL}_${unparsedRuns}`;
            }

            const last = components[components.length - 1];
            if (last && label === previousLabel) {
                last.value = `${last.value} ${token}`;
            } else {
                components.push({ label, value: token });
            }
            previousLabel = label;
        }

        return components;
    }
}
