/**
 * Open-Meteo current conditions: fetch, decode, render.
 * https://open-meteo.com/
 */

import { z } from 'zod';
import { logger } from '../logger.js';
import { appError, errorMessage, ok, Result } from '../errors.js';
import { HttpClient } from '../http/http-client.js';
import { WeatherResult } from './types.js';
import { numericValue } from './schemas.js';

const weatherPayloadSchema = z.object({
    latitude: numericValue,
    longitude: numericValue,
    current: z.record(z.union([z.number(), z.string()])),
});

const CURRENT_BLOCK = /"current"\s*:\s*\{([^{}]*)\}/;
const NUMBER_MEMBER = /"([^"\\]+)"\s*:\s*(-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?)\s*(?=,|$)/g;

/**
 * Numeric members of the `current` object exactly as they appear in the body.
 * JSON.parse loses the difference between `72` and `72.0`.
 */
export function currentNumberTokens(body: string): Record<string, string> {
    const tokens: Record<string, string> = {};
    const block = CURRENT_BLOCK.exec(body);
    if (!block) return tokens;
    for (const [, key, token] of block[1].matchAll(NUMBER_MEMBER)) {
        tokens[key] = token;
    }
    return tokens;
}

/**
 * Build a WeatherResult from a decoded forecast payload. When the body text is
 * given, numbers keep the formatting the service sent.
 */
export function parseWeatherResult(payload: unknown, body?: string): Result<WeatherResult> {
    if (
        typeof payload !== 'object' || payload === null ||
        !('latitude' in payload) || !('longitude' in payload) || !('current' in payload)
    ) {
        return appError('WeatherError', 'Missing required fields in weather data');
    }

    const parsed = weatherPayloadSchema.safeParse(payload);
    if (!parsed.success) {
        const fields = parsed.error.issues.map(issue => issue.path.join('.')).join(', ');
        return appError('WeatherError', `Invalid weather data: ${fields}`);
    }

    const tokens: Record<string, string> = body === undefined ? {} : currentNumberTokens(body);
    const currentText: Record<string, string> = {};
    for (const [key, value] of Object.entries(parsed.data.current)) {
        const token = tokens[key];
        currentText[key] = token !== undefined && Number(token) === value ? token : String(value);
    }

    return ok(Object.freeze({
        latitude: parsed.data.latitude,
        longitude: parsed.data.longitude,
        current: Object.freeze({ ...parsed.data.current }),
        currentText: Object.freeze(currentText),
    }));
}

/**
 * Request current conditions from a prepared forecast URL.
 */
export async function getWeather(
    client: HttpClient,
    url: string,
    verbose: boolean = false
): Promise<Result<WeatherResult>> {
    const response = await client.fetch(url, verbose);
    if (!response.ok) return response;

    let payload: unknown;
    try {
        payload = JSON.parse(response.data);
    } catch (error) {
        return appError('WeatherError', `Malformed JSON response: ${errorMessage(error)}`);
    }

    const result = parseWeatherResult(payload, response.data);
    if (result.ok) {
        logger.debug(describeWeather(result.data));
    }
    return result;
}

export function formatWeather(weather: WeatherResult): string {
    const temperature = weather.currentText['temperature_2m'];
    const windSpeed = weather.currentText['wind_speed_10m'];
    return `Temperature:\t${temperature}°\nWind Speed:\t${windSpeed} MPH`;
}

export function describeWeather(weather: WeatherResult): string {
    return `WeatherResult(latitude=${weather.latitude}, longitude=${weather.longitude}, ` +
        `temperature=${weather.currentText['temperature_2m']}, wind_speed=${weather.currentText['wind_speed_10m']})`;
}
