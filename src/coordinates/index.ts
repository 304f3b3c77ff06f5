export {
	degreesToRadians,
	normalizeDegrees,
	normalizeLongitude,
	preciseSinCos,
	radiansToDegrees,
	type SinCos
} from './angle.js';
export {
	CartesianCoordinate,
	CartesianCoordinateJsonSchema,
	type CartesianCoordinateJson
} from './cartesian.js';
export {
	CoordinateError,
	DegenerateCoordinateError,
	ValidationError,
	type CartesianComponents,
	type CoordinateField,
	type Result
} from './errors.js';
export {
	GeographicCoordinate,
	GeographicCoordinateJsonSchema,
	MAX_LATITUDE,
	MIN_LATITUDE,
	type GeographicCoordinateJson
} from './geographic.js';
export {
	DEFAULT_ABSOLUTE_TOLERANCE,
	DEFAULT_ALTITUDE_TOLERANCE,
	DEFAULT_RELATIVE_TOLERANCE,
	ToleranceSchema,
	angularDifference,
	approxEqual,
	approxEqualAngle,
	resolveTolerance,
	type ResolvedTolerance,
	type Tolerance
} from './tolerance.js';
