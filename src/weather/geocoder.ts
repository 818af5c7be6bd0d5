/**
 * Geocoding client for geocode.maps.co
 * Requires an API key (MAPS_API_KEY)
 */

import { z } from 'zod';
import { config } from '../config.js';
import { logger } from '../logger.js';
import { appError, errorMessage, ok, Result } from '../errors.js';
import { HttpClient } from '../http/http-client.js';
import { GeocodeCandidate } from './types.js';
import { numericValue } from './schemas.js';

// lat/lon arrive as numeric strings
const geocodeResponseSchema = z.array(
    z.object({
        display_name: z.string(),
        lat: numericValue,
        lon: numericValue,
    })
);

export interface GeocodeOptions {
    apiKey?: string;
    baseUrl?: string;
    verbose?: boolean;
}

export function buildGeocodeUrl(address: string, apiKey: string, baseUrl: string = config.geocodeBaseUrl): string {
    return `${baseUrl}?q=${encodeURIComponent(address)}&api_key=${encodeURIComponent(apiKey)}`;
}

/**
 * Look up candidate coordinates for a sanitized address.
 * Candidates keep the service's ranking; callers use the first.
 */
export async function geocode(
    client: HttpClient,
    address: string,
    options: GeocodeOptions = {}
): Promise<Result<GeocodeCandidate[]>> {
    const { apiKey = config.mapsApiKey, baseUrl = config.geocodeBaseUrl, verbose = false } = options;

    const response = await client.fetch(buildGeocodeUrl(address, apiKey, baseUrl), verbose);
    if (!response.ok) {
        return appError('GeocodeError', `Error getting coordinates from address: ${response.error.message}`);
    }

    let payload: unknown;
    try {
        payload = JSON.parse(response.data);
    } catch (error) {
        return appError('GeocodeError', `Malformed JSON response: ${errorMessage(error)}`);
    }

    const parsed = geocodeResponseSchema.safeParse(payload);
    if (!parsed.success) {
        logger.debug('Unexpected geocoding payload', { issues: parsed.error.issues.length });
        return appError('GeocodeError', 'Unexpected geocoding response');
    }

    if (parsed.data.length === 0) {
        return appError(
            'GeocodeError',
            `No coordinates found for address: ${address}. Verify that the address is valid.`
        );
    }

    const candidates: GeocodeCandidate[] = parsed.data.map(place => ({
        displayName: place.display_name,
        latitude: place.lat,
        longitude: place.lon,
    }));

    if (verbose) {
        const [first] = parsed.data;
        const locationData = {
            display_name: first.display_name,
            lat: first.lat,
            long: first.lon,
        };
        logger.info(`Location data:\n${JSON.stringify(locationData, null, 2)}`);
    }

    return ok(candidates);
}
