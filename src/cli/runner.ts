/**
 * Command line orchestration: flags in, two lines of weather out.
 *
 * Every stage returns a Result; this is the only place a failure is reported.
 */

import { logger, setVerbose } from '../logger.js';
import { Result } from '../errors.js';
import { AddressParser, sanitizeAddress } from '../address/sanitizer.js';
import { HttpClient, withHttpClient } from '../http/http-client.js';
import { geocode } from '../weather/geocoder.js';
import { buildForecastUrl } from '../weather/forecast-url.js';
import { formatWeather, getWeather } from '../weather/forecast.js';
import { RequestInputs, WeatherResult } from '../weather/types.js';
import { validateArguments } from '../validation/arguments.js';
import { parseArgs } from './args.js';

export interface RunnerDeps {
    addressParser?: AddressParser;
    httpClientFactory?: () => HttpClient;
    write?: (text: string) => void;
    apiKey?: string;
}

function writeStdout(text: string): void {
    process.stdout.write(`${text}\n`);
}

/**
 * Turn validated inputs into a forecast URL, geocoding first when given an address.
 * The first geocoding candidate is used as-is.
 */
export async function resolveForecastUrl(
    client: HttpClient,
    inputs: RequestInputs,
    deps: Pick<RunnerDeps, 'addressParser' | 'apiKey'> = {}
): Promise<Result<string>> {
    if (inputs.mode === 'coordinates') {
        return buildForecastUrl(inputs.coordinates.latitude, inputs.coordinates.longitude);
    }

    const sanitized = sanitizeAddress(inputs.address, { parser: deps.addressParser, verbose: inputs.verbose });
    if (!sanitized.ok) return sanitized;

    const candidates = await geocode(client, sanitized.data, { apiKey: deps.apiKey, verbose: inputs.verbose });
    if (!candidates.ok) return candidates;

    const [first] = candidates.data;
    return buildForecastUrl(first.latitude, first.longitude);
}

async function fetchCurrentWeather(
    client: HttpClient,
    inputs: RequestInputs,
    deps: RunnerDeps
): Promise<Result<WeatherResult>> {
    const url = await resolveForecastUrl(client, inputs, deps);
    if (!url.ok) return url;
    return getWeather(client, url.data, inputs.verbose);
}

/**
 * Run one invocation. Resolves to the process exit code.
 */
export async function run(argv: string[], deps: RunnerDeps = {}): Promise<number> {
    const write = deps.write ?? writeStdout;

    const args = parseArgs(argv);
    const inputs = args.ok ? validateArguments(args.data) : args;
    if (!inputs.ok) {
        logger.error(inputs.error.message);
        return 1;
    }

    const request = inputs.data;
    setVerbose(request.verbose);

    const weather = await withHttpClient(
        client => fetchCurrentWeather(client, request, deps),
        deps.httpClientFactory
    );
    if (!weather.ok) {
        logger.error(weather.error.message, weather.error.details ?? {});
        return 1;
    }

    write(formatWeather(weather.data));
    return 0;
}
