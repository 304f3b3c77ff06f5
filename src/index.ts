export * from './coordinates/index.js';
export {
	Converter,
	ConverterOptionsSchema,
	EARTH_MEAN_RADIUS,
	RadiusSchema,
	safeToGeographic,
	toCartesian,
	toGeographic,
	type ConverterOptions
} from './convert/converter.js';
export { Rotation, axisVector, type Axis } from './transform/rotation.js';
