import { z } from 'zod';

import { ValidationError, capture, requireFinite, type Result } from './errors.js';
import { approxEqual, type Tolerance } from './tolerance.js';

export const CartesianCoordinateJsonSchema = z.object({
	x: z.number(),
	y: z.number(),
	z: z.number()
});

export type CartesianCoordinateJson = z.infer<typeof CartesianCoordinateJsonSchema>;

export class CartesianCoordinate {
	readonly x: number;
	readonly y: number;
	readonly z: number;

	constructor(x: number, y: number, z: number) {
		this.x = requireFinite('x', x);
		this.y = requireFinite('y', y);
		this.z = requireFinite('z', z);
	}

	static create(x: number, y: number, z: number): Result<CartesianCoordinate> {
		return capture(() => new CartesianCoordinate(x, y, z));
	}

	static origin(): CartesianCoordinate {
		return new CartesianCoordinate(0, 0, 0);
	}

	static fromJSON(value: unknown): CartesianCoordinate {
		const parsed = CartesianCoordinateJsonSchema.safeParse(value);
		if (!parsed.success) {
			const key = parsed.error.issues[0]?.path[0];
			throw new ValidationError('CartesianCoordinate JSON must have numeric x/y/z.', {
				field: key === 'y' || key === 'z' ? key : 'x',
				value
			});
		}
		return new CartesianCoordinate(parsed.data.x, parsed.data.y, parsed.data.z);
	}

	withX(x: number): CartesianCoordinate {
		return new CartesianCoordinate(x, this.y, this.z);
	}

	withY(y: number): CartesianCoordinate {
		return new CartesianCoordinate(this.x, y, this.z);
	}

	withZ(z: number): CartesianCoordinate {
		return new CartesianCoordinate(this.x, this.y, z);
	}

	/** Distance from the origin. */
	magnitude(): number {
		return Math.hypot(this.x, this.y, this.z);
	}

	isOrigin(): boolean {
		return this.x === 0 && this.y === 0 && this.z === 0;
	}

	isEqual(other: CartesianCoordinate): boolean {
		return this.x === other.x && this.y === other.y && this.z === other.z;
	}

	isClose(other: CartesianCoordinate, tolerance: Tolerance = {}): boolean {
		return (
			approxEqual(this.x, other.x, tolerance) &&
			approxEqual(this.y, other.y, tolerance) &&
			approxEqual(this.z, other.z, tolerance)
		);
	}

	toJSON(): CartesianCoordinateJson {
		return { x: this.x, y: this.y, z: this.z };
	}

	toString(): string {
		return `CartesianCoordinate(${String(this.x)}, ${String(this.y)}, ${String(this.z)})`;
	}
}
