import dotenv from 'dotenv';

dotenv.config();

export interface HttpConfig {
    connectTimeoutMs: number;
    readTimeoutMs: number;
    retries: number;
    backoffFactor: number;          // Seconds; delay before retry n is factor * 2^(n-1)
    retryStatuses: number[];
    maxConnections: number;
    rejectUnauthorized: boolean;
}

export interface Config {
    // Geocoding
    mapsApiKey: string;
    geocodeBaseUrl: string;

    // Forecast
    weatherBaseUrl: string;
    defaultParams: string;

    // Transport
    http: HttpConfig;

    // Logging
    logDir: string;
}

export function getEnvVarOptional(name: string, defaultValue: string): string {
    return process.env[name] || defaultValue;
}

export function getEnvVarNumber(name: string, defaultValue: number): number {
    const value = process.env[name];
    if (!value) return defaultValue;
    const parsed = parseFloat(value);
    if (isNaN(parsed)) return defaultValue;
    return parsed;
}

export const config: Config = {
    mapsApiKey: getEnvVarOptional('MAPS_API_KEY', ''),
    geocodeBaseUrl: getEnvVarOptional('GEOCODE_BASE_URL', 'https://geocode.maps.co/search'),

    weatherBaseUrl: getEnvVarOptional('WEATHER_BASE_URL', 'https://api.open-meteo.com/v1/forecast'),
    defaultParams: 'current=temperature_2m,wind_speed_10m&temperature_unit=fahrenheit&wind_speed_unit=mph&timezone=auto',

    http: {
        connectTimeoutMs: getEnvVarNumber('HTTP_CONNECT_TIMEOUT_MS', 2000),
        readTimeoutMs: getEnvVarNumber('HTTP_READ_TIMEOUT_MS', 5000),
        retries: 3,
        backoffFactor: 0.3,
        retryStatuses: [500, 502, 503, 504],
        maxConnections: 10,
        rejectUnauthorized: true,
    },

    logDir: getEnvVarOptional('LOG_DIR', 'logs'),
};
