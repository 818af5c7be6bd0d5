export const LATITUDE_RANGE = { min: -90, max: 90 } as const;
export const LONGITUDE_RANGE = { min: -180, max: 180 } as const;

function inRange(value: number, range: { min: number; max: number }): boolean {
    return Number.isFinite(value) && value >= range.min && value <= range.max;
}

/**
 * True when both values lie inside their geographic bounds (inclusive).
 */
export function validateCoordinates(latitude: number, longitude: number): boolean {
    return inRange(latitude, LATITUDE_RANGE) && inRange(longitude, LONGITUDE_RANGE);
}
