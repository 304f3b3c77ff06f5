import { z } from 'zod';

import { preciseSinCos, radiansToDegrees } from '../coordinates/angle.js';
import { CartesianCoordinate } from '../coordinates/cartesian.js';
import {
	DegenerateCoordinateError,
	ValidationError,
	capture,
	type Result
} from '../coordinates/errors.js';
import { GeographicCoordinate, MAX_LATITUDE, MIN_LATITUDE } from '../coordinates/geographic.js';

/** Mean Earth radius in meters. */
export const EARTH_MEAN_RADIUS = 6_371_000;

export const RadiusSchema = z.number().finite().positive();

export const ConverterOptionsSchema = z.object({
	radius: RadiusSchema.default(EARTH_MEAN_RADIUS)
});

export type ConverterOptions = z.input<typeof ConverterOptionsSchema>;

function resolveRadius(radius: number): number {
	const parsed = RadiusSchema.safeParse(radius);
	if (!parsed.success) {
		throw new ValidationError(
			`radius must be a finite positive number, got ${String(radius)}.`,
			{ field: 'radius', value: radius }
		);
	}
	return parsed.data;
}

function clamp(value: number, min: number, max: number): number {
	return Math.min(max, Math.max(min, value));
}

/**
 * Geographic to Cartesian on a sphere of the given radius. The altitude is added to the radius,
 * so an altitude of -radius yields the origin and an altitude below it yields the point mirrored
 * through the center. Throws a `ValidationError` when `radius + altitude` overflows.
 */
export function toCartesian(
	geo: GeographicCoordinate,
	radius = EARTH_MEAN_RADIUS
): CartesianCoordinate {
	const r = resolveRadius(radius) + geo.altitude;
	if (!Number.isFinite(r)) {
		throw new ValidationError(
			`radius + altitude overflows: ${String(radius)} + ${String(geo.altitude)}.`,
			{ field: 'altitude', value: geo.altitude }
		);
	}
	const latitude = preciseSinCos(geo.latitude);
	const longitude = preciseSinCos(geo.longitude);

	return new CartesianCoordinate(
		r * latitude.cos * longitude.cos,
		r * latitude.cos * longitude.sin,
		r * latitude.sin
	);
}

export function toGeographic(
	cart: CartesianCoordinate,
	radius = EARTH_MEAN_RADIUS
): GeographicCoordinate {
	const sphereRadius = resolveRadius(radius);
	const r = cart.magnitude();
	if (r === 0) {
		throw new DegenerateCoordinateError(
			'Cannot derive latitude/longitude of the sphere center.',
			cart.toJSON()
		);
	}

	// z / r can overshoot ±1 by an ulp; asin would return NaN.
	const phi = Math.asin(clamp(cart.z / r, -1, 1));
	const lambda = Math.atan2(cart.y, cart.x);

	return new GeographicCoordinate(
		clamp(radiansToDegrees(phi), MIN_LATITUDE, MAX_LATITUDE),
		radiansToDegrees(lambda),
		r - sphereRadius
	);
}

export function safeToGeographic(
	cart: CartesianCoordinate,
	radius = EARTH_MEAN_RADIUS
): Result<GeographicCoordinate> {
	return capture(() => toGeographic(cart, radius));
}

/**
 * Binds a sphere radius to the conversion functions.
 */
export class Converter {
	readonly radius: number;

	constructor(options: ConverterOptions = {}) {
		const parsed = ConverterOptionsSchema.safeParse(options);
		if (!parsed.success) {
			throw new ValidationError(
				`Invalid Converter options: radius must be a finite positive number.`,
				{ field: 'radius', value: options.radius }
			);
		}
		this.radius = parsed.data.radius;
	}

	toCartesian(geo: GeographicCoordinate): CartesianCoordinate {
		return toCartesian(geo, this.radius);
	}

	toGeographic(cart: CartesianCoordinate): GeographicCoordinate {
		return toGeographic(cart, this.radius);
	}

	safeToGeographic(cart: CartesianCoordinate): Result<GeographicCoordinate> {
		return safeToGeographic(cart, this.radius);
	}
}
