import {
	CartesianCoordinate,
	Converter,
	GeographicCoordinate,
	ValidationError
} from '../../src/index.js';

type Sample = { name: string; latitude: number; longitude: number; altitude: number };

const samples: Sample[] = [
	{ name: 'null island', latitude: 0, longitude: 0, altitude: 0 },
	{ name: 'north pole', latitude: 90, longitude: 0, altitude: 0 },
	{ name: 'antimeridian', latitude: 0, longitude: -180, altitude: 0 },
	{ name: 'mountain top', latitude: 27.9881, longitude: 86.925, altitude: 8848 },
	{ name: 'wrapped longitude', latitude: -33.8688, longitude: 511.2093, altitude: 58 },
	{ name: 'past the pole', latitude: 91, longitude: 0, altitude: 0 }
];

function main(): void {
	const converter = new Converter();

	for (const sample of samples) {
		const parsed = GeographicCoordinate.create(sample.latitude, sample.longitude, sample.altitude);
		if (!parsed.success) {
			console.error(`[round-trip] ${sample.name}: ${parsed.error.message}`);
			continue;
		}

		const geo = parsed.data;
		const cart = converter.toCartesian(geo);
		const back = converter.toGeographic(cart);
		console.log(`[round-trip] ${sample.name}`, {
			input: geo.toJSON(),
			cartesian: cart.toJSON(),
			back: back.toJSON(),
			close: back.isClose(geo, { absolute: 1e-6 })
		});
	}

	const center = converter.safeToGeographic(CartesianCoordinate.origin());
	if (!center.success) {
		console.error(`[round-trip] ${center.error.name}: ${center.error.message}`);
	}
}

try {
	main();
} catch (error) {
	if (error instanceof ValidationError) {
		console.error(`[round-trip] invalid ${error.field}`, error.value);
	}
	throw error;
}
