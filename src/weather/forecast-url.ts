import { config } from '../config.js';
import { appError, ok, Result } from '../errors.js';
import { validateCoordinates } from '../validation/coordinates.js';

function toNumber(value: unknown): number | null {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : null;
    }
    if (typeof value === 'string' && value.trim().length > 0) {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : null;
    }
    return null;
}

/**
 * Build the Open-Meteo current-conditions URL for a coordinate pair.
 * Accepts numeric strings since geocoding results carry them that way.
 */
export function buildForecastUrl(
    latitude: unknown,
    longitude: unknown,
    baseUrl: string = config.weatherBaseUrl
): Result<string> {
    const lat = toNumber(latitude);
    const lon = toNumber(longitude);

    if (lat === null || lon === null) {
        return appError(
            'InvalidArguments',
            `Lat/long must be numerical values. Received: Latitude: ${String(latitude)}, Longitude: ${String(longitude)}`
        );
    }

    if (!validateCoordinates(lat, lon)) {
        return appError('InvalidArguments', `Invalid lat/long provided. Latitude: ${lat}, Longitude: ${lon}`);
    }

    return ok(`${baseUrl}?latitude=${lat}&longitude=${lon}&${config.defaultParams}`);
}
