import { z } from 'zod';

import { normalizeDegrees } from './angle.js';
import { ValidationError } from './errors.js';

export const DEFAULT_ABSOLUTE_TOLERANCE = 1e-9;
export const DEFAULT_RELATIVE_TOLERANCE = 1e-9;
/**
 * Default absolute tolerance for altitudes. A recovered altitude is `r - radius` and inherits the
 * rounding error of the radius, about 1e-9 at Earth scale in metres.
 */
export const DEFAULT_ALTITUDE_TOLERANCE = 1e-6;

export const ToleranceSchema = z.object({
	absolute: z.number().finite().nonnegative().default(DEFAULT_ABSOLUTE_TOLERANCE),
	relative: z.number().finite().nonnegative().default(DEFAULT_RELATIVE_TOLERANCE)
});

export type Tolerance = z.input<typeof ToleranceSchema>;
export type ResolvedTolerance = z.output<typeof ToleranceSchema>;

export function resolveTolerance(tolerance: Tolerance = {}): ResolvedTolerance {
	const parsed = ToleranceSchema.safeParse(tolerance);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const path = issue ? issue.path.join('.') : 'tolerance';
		throw new ValidationError(
			`Invalid tolerance (${path}): ${issue?.message ?? 'invalid value'}.`,
			{ field: 'tolerance', value: tolerance }
		);
	}
	return parsed.data;
}

function withinTolerance(difference: number, scale: number, tolerance: ResolvedTolerance): boolean {
	return difference <= Math.max(tolerance.absolute, tolerance.relative * scale);
}

/**
 * `|a - b| <= max(absolute, relative * max(|a|, |b|))`. NaN is never close to anything.
 */
export function approxEqual(a: number, b: number, tolerance: Tolerance = {}): boolean {
	const resolved = resolveTolerance(tolerance);
	if (a === b) {
		return true;
	}
	if (!Number.isFinite(a) || !Number.isFinite(b)) {
		return false;
	}
	return withinTolerance(Math.abs(a - b), Math.max(Math.abs(a), Math.abs(b)), resolved);
}

/** Smallest absolute difference between two angles in degrees, in [0, 180]. */
export function angularDifference(a: number, b: number): number {
	const delta = normalizeDegrees(a - b);
	return delta > 180 ? 360 - delta : delta;
}

/**
 * Closeness of two angles in degrees, measured around the circle. The relative part scales with
 * the larger magnitude of the two inputs, as in {@link approxEqual}.
 */
export function approxEqualAngle(a: number, b: number, tolerance: Tolerance = {}): boolean {
	const resolved = resolveTolerance(tolerance);
	if (a === b) {
		return true;
	}
	if (!Number.isFinite(a) || !Number.isFinite(b)) {
		return false;
	}
	return withinTolerance(angularDifference(a, b), Math.max(Math.abs(a), Math.abs(b)), resolved);
}
