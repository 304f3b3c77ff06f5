import { preciseSinCos } from '../coordinates/angle.js';
import { CartesianCoordinate } from '../coordinates/cartesian.js';
import { ValidationError, requireFinite } from '../coordinates/errors.js';

export type Axis = 'x' | 'y' | 'z';

export function axisVector(axis: Axis): CartesianCoordinate {
	switch (axis) {
		case 'x':
			return new CartesianCoordinate(1, 0, 0);
		case 'y':
			return new CartesianCoordinate(0, 1, 0);
		case 'z':
			return new CartesianCoordinate(0, 0, 1);
	}
}

/**
 * Rotation of a Cartesian point about an axis through the origin, by an angle in degrees,
 * following the right-hand rule (Rodrigues' rotation formula).
 */
export class Rotation {
	readonly axis: CartesianCoordinate;
	readonly angle: number;

	constructor(axis: CartesianCoordinate, angle: number) {
		this.angle = requireFinite('angle', angle);
		const length = axis.magnitude();
		if (length === 0) {
			if (angle !== 0) {
				throw new ValidationError('Rotation axis must not be the zero vector.', {
					field: 'axis',
					value: axis.toJSON()
				});
			}
			this.axis = axis;
			return;
		}
		this.axis =
			length === 1
				? axis
				: new CartesianCoordinate(axis.x / length, axis.y / length, axis.z / length);
	}

	static identity(): Rotation {
		return new Rotation(CartesianCoordinate.origin(), 0);
	}

	static about(axis: Axis, angle: number): Rotation {
		return new Rotation(axisVector(axis), angle);
	}

	withAngle(angle: number): Rotation {
		return new Rotation(this.axis, angle);
	}

	apply(point: CartesianCoordinate): CartesianCoordinate {
		if (this.axis.isOrigin()) {
			return point;
		}

		const { sin, cos } = preciseSinCos(this.angle);
		const k = 1 - cos;
		const { x: ux, y: uy, z: uz } = this.axis;
		const { x, y, z } = point;

		return new CartesianCoordinate(
			x * (cos + ux * ux * k) + y * (ux * uy * k - uz * sin) + z * (ux * uz * k + uy * sin),
			x * (uy * ux * k + uz * sin) + y * (cos + uy * uy * k) + z * (uy * uz * k - ux * sin),
			x * (uz * ux * k - uy * sin) + y * (uz * uy * k + ux * sin) + z * (cos + uz * uz * k)
		);
	}
}
