/**
 * Angle helpers. Every angle stored by this library is in degrees; radians only appear at the
 * API boundary and inside the trigonometric calls.
 */

export function degreesToRadians(degrees: number): number {
	// Divide first so that multiples of 90 map onto exact fractions of Math.PI.
	return (degrees / 180) * Math.PI;
}

export function radiansToDegrees(radians: number): number {
	return (radians / Math.PI) * 180;
}

function euclideanRemainder(value: number, modulus: number): number {
	const remainder = value % modulus;
	return remainder < 0 ? remainder + modulus : remainder;
}

/**
 * Wraps a longitude into (-180, 180]. Values already in range are returned untouched; -180 and
 * every value congruent to it fold onto 180.
 */
export function normalizeLongitude(longitude: number): number {
	if (longitude > -180 && longitude <= 180) {
		return longitude;
	}
	const wrapped = euclideanRemainder(longitude + 180, 360) - 180;
	return wrapped <= -180 ? 180 : wrapped;
}

/** Wraps any angle into [0, 360). */
export function normalizeDegrees(degrees: number): number {
	if (degrees >= 0 && degrees < 360) {
		return degrees;
	}
	const wrapped = euclideanRemainder(degrees, 360);
	return wrapped >= 360 ? 0 : wrapped;
}

export type SinCos = { sin: number; cos: number };

/**
 * Sine and cosine of an angle in degrees, exact at multiples of 90 where Math.sin/Math.cos
 * leave residues such as 6.1e-17.
 */
export function preciseSinCos(degrees: number): SinCos {
	const turn = normalizeDegrees(degrees);
	switch (turn) {
		case 0:
			return { sin: 0, cos: 1 };
		case 90:
			return { sin: 1, cos: 0 };
		case 180:
			return { sin: 0, cos: -1 };
		case 270:
			return { sin: -1, cos: 0 };
		default: {
			const radians = degreesToRadians(degrees);
			return { sin: Math.sin(radians), cos: Math.cos(radians) };
		}
	}
}
