// parse-address ships no type declarations and has no @types package.
declare module 'parse-address' {
    export interface ParsedLocation {
        number?: string;
        prefix?: string;
        street?: string;
        type?: string;
        suffix?: string;
        sec_unit_type?: string;
        sec_unit_num?: string;
        street1?: string;
        type1?: string;
        street2?: string;
        type2?: string;
        city?: string;
        state?: string;
        zip?: string;
        plus4?: string;
        [label: string]: string | undefined;
    }

    export function parseLocation(address: string): ParsedLocation | null | undefined;
}
