import { z } from 'zod';

import { degreesToRadians, normalizeLongitude, radiansToDegrees } from './angle.js';
import { ValidationError, capture, requireFinite, type Result } from './errors.js';
import {
	DEFAULT_ALTITUDE_TOLERANCE,
	approxEqual,
	approxEqualAngle,
	type Tolerance
} from './tolerance.js';

export const MIN_LATITUDE = -90;
export const MAX_LATITUDE = 90;

export const GeographicCoordinateJsonSchema = z.object({
	latitude: z.number(),
	longitude: z.number(),
	altitude: z.number().optional()
});

export type GeographicCoordinateJson = {
	latitude: number;
	longitude: number;
	altitude: number;
};

function validateLatitude(latitude: number): number {
	requireFinite('latitude', latitude);
	if (latitude < MIN_LATITUDE || latitude > MAX_LATITUDE) {
		throw new ValidationError(
			`latitude must be in [${String(MIN_LATITUDE)}, ${String(MAX_LATITUDE)}], got ${String(latitude)}.`,
			{ field: 'latitude', value: latitude }
		);
	}
	return latitude;
}

/**
 * A point given by latitude and longitude in degrees and by its altitude above the reference
 * sphere. Latitude outside [-90, 90] is rejected; longitude is wrapped into (-180, 180].
 */
export class GeographicCoordinate {
	readonly latitude: number;
	readonly longitude: number;
	readonly altitude: number;

	constructor(latitude: number, longitude: number, altitude = 0) {
		this.latitude = validateLatitude(latitude);
		this.longitude = normalizeLongitude(requireFinite('longitude', longitude));
		this.altitude = requireFinite('altitude', altitude);
	}

	static create(
		latitude: number,
		longitude: number,
		altitude = 0
	): Result<GeographicCoordinate> {
		return capture(() => new GeographicCoordinate(latitude, longitude, altitude));
	}

	static fromRadians(latitude: number, longitude: number, altitude = 0): GeographicCoordinate {
		return new GeographicCoordinate(
			radiansToDegrees(requireFinite('latitude', latitude)),
			radiansToDegrees(requireFinite('longitude', longitude)),
			altitude
		);
	}

	static fromJSON(value: unknown): GeographicCoordinate {
		const parsed = GeographicCoordinateJsonSchema.safeParse(value);
		if (!parsed.success) {
			throw new ValidationError('GeographicCoordinate JSON must have numeric latitude/longitude.', {
				field: fieldOf(parsed.error.issues[0]?.path[0]),
				value
			});
		}
		const { latitude, longitude, altitude } = parsed.data;
		return new GeographicCoordinate(latitude, longitude, altitude);
	}

	get latitudeRadians(): number {
		return degreesToRadians(this.latitude);
	}

	get longitudeRadians(): number {
		return degreesToRadians(this.longitude);
	}

	/** True at either pole, where longitude carries no information. */
	isPole(): boolean {
		return Math.abs(this.latitude) === MAX_LATITUDE;
	}

	withLatitude(latitude: number): GeographicCoordinate {
		return new GeographicCoordinate(latitude, this.longitude, this.altitude);
	}

	withLongitude(longitude: number): GeographicCoordinate {
		return new GeographicCoordinate(this.latitude, longitude, this.altitude);
	}

	withAltitude(altitude: number): GeographicCoordinate {
		return new GeographicCoordinate(this.latitude, this.longitude, altitude);
	}

	isEqual(other: GeographicCoordinate): boolean {
		return (
			this.latitude === other.latitude &&
			this.longitude === other.longitude &&
			this.altitude === other.altitude
		);
	}

	/**
	 * Approximate equality. Longitude is compared around the circle, and skipped entirely when
	 * both latitudes are within tolerance of the same pole. Without an explicit absolute tolerance,
	 * altitude uses {@link DEFAULT_ALTITUDE_TOLERANCE}.
	 */
	isClose(other: GeographicCoordinate, tolerance: Tolerance = {}): boolean {
		if (!approxEqual(this.latitude, other.latitude, tolerance)) {
			return false;
		}
		const altitudeTolerance = {
			...tolerance,
			absolute: tolerance.absolute ?? DEFAULT_ALTITUDE_TOLERANCE
		};
		if (!approxEqual(this.altitude, other.altitude, altitudeTolerance)) {
			return false;
		}
		const atPole =
			approxEqual(Math.abs(this.latitude), MAX_LATITUDE, tolerance) &&
			Math.sign(this.latitude) === Math.sign(other.latitude);
		return atPole || approxEqualAngle(this.longitude, other.longitude, tolerance);
	}

	toJSON(): GeographicCoordinateJson {
		return { latitude: this.latitude, longitude: this.longitude, altitude: this.altitude };
	}

	toString(): string {
		return `GeographicCoordinate(${String(this.latitude)}, ${String(this.longitude)}, ${String(this.altitude)})`;
	}
}

function fieldOf(key: PropertyKey | undefined): 'latitude' | 'longitude' | 'altitude' {
	return key === 'longitude' || key === 'altitude' ? key : 'latitude';
}
