import { describe, expect, it } from 'vitest';

import { toCartesian, toGeographic } from '../src/convert/converter.js';
import { CartesianCoordinate } from '../src/coordinates/cartesian.js';
import { ValidationError } from '../src/coordinates/errors.js';
import { GeographicCoordinate } from '../src/coordinates/geographic.js';
import { Rotation, axisVector } from '../src/transform/rotation.js';

function expectPoint(point: CartesianCoordinate, want: { x: number; y: number; z: number }) {
	expect(point.x).toBeCloseTo(want.x, 12);
	expect(point.y).toBeCloseTo(want.y, 12);
	expect(point.z).toBeCloseTo(want.z, 12);
}

describe('Rotation', () => {
	it('leaves points untouched as identity', () => {
		const point = new CartesianCoordinate(1, 2, 3);
		expect(Rotation.identity().apply(point)).toBe(point);
	});

	it('rotates about the x axis', () => {
		const y1 = new CartesianCoordinate(0, 1, 0);
		expectPoint(Rotation.about('x', 360).apply(y1), { x: 0, y: 1, z: 0 });
		expectPoint(Rotation.about('x', 180).apply(y1), { x: 0, y: -1, z: 0 });
		expectPoint(Rotation.about('x', 90).apply(y1), { x: 0, y: 0, z: 1 });
	});

	it('follows the right-hand rule about y and z', () => {
		expectPoint(Rotation.about('y', 90).apply(new CartesianCoordinate(0, 0, 1)), {
			x: 1,
			y: 0,
			z: 0
		});
		expectPoint(Rotation.about('z', 90).apply(new CartesianCoordinate(1, 0, 0)), {
			x: 0,
			y: 1,
			z: 0
		});
		expectPoint(Rotation.about('z', -90).apply(new CartesianCoordinate(1, 0, 0)), {
			x: 0,
			y: -1,
			z: 0
		});
	});

	it('normalizes the axis to unit length', () => {
		const rotation = new Rotation(new CartesianCoordinate(0, 0, 5), 90);
		expect(rotation.axis.toJSON()).toEqual({ x: 0, y: 0, z: 1 });
		expectPoint(rotation.apply(new CartesianCoordinate(2, 0, 0)), { x: 0, y: 2, z: 0 });
	});

	it('rotates about an arbitrary axis', () => {
		// A third of a turn about (1, 1, 1) cycles the principal axes.
		const rotation = new Rotation(new CartesianCoordinate(1, 1, 1), 120);
		expectPoint(rotation.apply(new CartesianCoordinate(1, 0, 0)), { x: 0, y: 1, z: 0 });
		expect(rotation.withAngle(0).apply(new CartesianCoordinate(1, 0, 0)).x).toBeCloseTo(1, 12);
	});

	it('rejects a zero axis with a non-zero angle and non-finite angles', () => {
		expect(() => new Rotation(CartesianCoordinate.origin(), 10)).toThrow(ValidationError);
		expect(() => Rotation.about('x', Number.NaN)).toThrow(/angle must be a finite number/);
	});

	it('shifts longitude when rotating a geographic point about the polar axis', () => {
		const start = toCartesian(new GeographicCoordinate(30, 10, 0), 1);
		const moved = toGeographic(Rotation.about('z', 45).apply(start), 1);
		expect(moved.latitude).toBeCloseTo(30, 9);
		expect(moved.longitude).toBeCloseTo(55, 9);
		expect(moved.altitude).toBeCloseTo(0, 9);
	});
});

describe('axisVector', () => {
	it('returns the unit vector of each principal axis', () => {
		expect(axisVector('x').toJSON()).toEqual({ x: 1, y: 0, z: 0 });
		expect(axisVector('y').toJSON()).toEqual({ x: 0, y: 1, z: 0 });
		expect(axisVector('z').toJSON()).toEqual({ x: 0, y: 0, z: 1 });
	});
});
