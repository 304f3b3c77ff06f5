export type CoordinateField =
	| 'latitude'
	| 'longitude'
	| 'altitude'
	| 'x'
	| 'y'
	| 'z'
	| 'radius'
	| 'axis'
	| 'angle'
	| 'tolerance';

export class CoordinateError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'CoordinateError';
	}
}

export class ValidationError extends CoordinateError {
	readonly field: CoordinateField;
	readonly value: unknown;

	constructor(message: string, options: { field: CoordinateField; value: unknown }) {
		super(message);
		this.name = 'ValidationError';
		this.field = options.field;
		this.value = options.value;
	}
}

export type CartesianComponents = { x: number; y: number; z: number };

/**
 * Thrown when a Cartesian point has no geographic counterpart, i.e. the sphere center,
 * where latitude and longitude are undefined.
 */
export class DegenerateCoordinateError extends CoordinateError {
	readonly point: CartesianComponents;

	constructor(message: string, point: CartesianComponents) {
		super(message);
		this.name = 'DegenerateCoordinateError';
		this.point = point;
	}
}

export type Result<T, E extends CoordinateError = CoordinateError> =
	| { success: true; data: T }
	| { success: false; error: E };

export function capture<T>(fn: () => T): Result<T> {
	try {
		return { success: true, data: fn() };
	} catch (error) {
		if (error instanceof CoordinateError) {
			return { success: false, error };
		}
		throw error;
	}
}

export function requireFinite(field: CoordinateField, value: number): number {
	if (typeof value !== 'number' || !Number.isFinite(value)) {
		throw new ValidationError(`${field} must be a finite number, got ${String(value)}.`, {
			field,
			value
		});
	}
	return value;
}
