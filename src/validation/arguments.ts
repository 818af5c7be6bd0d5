import { appError, ok, Result } from '../errors.js';
import { RawArguments, RequestInputs } from '../weather/types.js';
import { validateCoordinates } from './coordinates.js';

/**
 * Apply the flag combination rules: an address or a full lat/long pair, never both.
 */
export function validateArguments(inputs: RawArguments): Result<RequestInputs> {
    const { address, latitude, longitude } = inputs;
    const verbose = inputs.verbose ?? false;
    const hasAddress = address !== undefined;
    const hasLatitude = latitude !== undefined;
    const hasLongitude = longitude !== undefined;

    if (hasAddress && (hasLatitude || hasLongitude)) {
        return appError('InvalidArguments', 'Address and latitude/longitude cannot be provided together.');
    }

    if (hasLatitude !== hasLongitude) {
        return appError('InvalidArguments', 'Both latitude and longitude must be provided together.');
    }

    if (address !== undefined) {
        return ok<RequestInputs>({ mode: 'address', address, verbose });
    }

    if (latitude === undefined || longitude === undefined) {
        return appError(
            'InvalidArguments',
            "Either '--latitude' and '--longitude' pair, or '--address' must be provided."
        );
    }

    if (!validateCoordinates(latitude, longitude)) {
        return appError('InvalidArguments', 'Invalid latitude and/or longitude values provided.');
    }

    return ok<RequestInputs>({ mode: 'coordinates', coordinates: { latitude, longitude }, verbose });
}
