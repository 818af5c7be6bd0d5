/**
 * Location and weather types shared across the request pipeline
 */

export interface Coordinates {
    latitude: number;   // -90..90
    longitude: number;  // -180..180
}

export interface GeocodeCandidate {
    displayName: string;
    latitude: number;
    longitude: number;
}

export interface WeatherResult {
    readonly latitude: number;
    readonly longitude: number;
    readonly current: Readonly<Record<string, number | string>>;
    /** `current` values as written in the response body, e.g. `72.0` rather than `72` */
    readonly currentText: Readonly<Record<string, string>>;
}

/**
 * Flags as they come off the command line, before any combination rule is applied.
 */
export interface RawArguments {
    address?: string;
    latitude?: number;
    longitude?: number;
    verbose?: boolean;
}

export type RequestInputs =
    | { mode: 'address'; address: string; verbose: boolean }
    | { mode: 'coordinates'; coordinates: Coordinates; verbose: boolean };
