import yargs from 'yargs';
import { appError, errorMessage, ok, Result } from '../errors.js';
import { RawArguments } from '../weather/types.js';

/**
 * Read the command line flags. Combination rules are checked later by validateArguments.
 */
export function parseArgs(argv: string[]): Result<RawArguments> {
    const parser = yargs(argv)
        .scriptName('weather-app')
        .usage('Fetch weather data.\n\n$0 --address <address> | --latitude <lat> --longitude <long>')
        .option('address', {
            describe: 'Address of the location',
            type: 'string',
        })
        .option('latitude', {
            describe: 'Latitude of the location',
            type: 'number',
        })
        .option('longitude', {
            describe: 'Longitude of the location',
            type: 'number',
        })
        .option('verbose', {
            describe: 'Enable verbose logging',
            type: 'boolean',
            default: false,
        })
        // a repeated flag keeps its last value
        .parserConfiguration({ 'duplicate-arguments-array': false })
        .strict()
        .version(false)
        .help()
        .fail((msg, err) => {
            throw new Error(msg || errorMessage(err));
        });

    try {
        const parsed = parser.parseSync();
        return ok({
            address: parsed.address,
            latitude: parsed.latitude,
            longitude: parsed.longitude,
            verbose: parsed.verbose,
        });
    } catch (error) {
        return appError('InvalidArguments', errorMessage(error));
    }
}
