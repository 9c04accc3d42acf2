/**
 * Surface module — public API.
 *
 * Barrel export for the star-sighting surface reconstruction library.
 * Everything in this directory is UI-independent; a presentation layer
 * consumes patches, star maps and curvature results from here.
 */

export { DEG2RAD, RAD2DEG, degToRad, radToDeg, clamp, asinDeg, acosDeg, atan2Deg, wrapDegrees, clampLatitude, normalizeLongitude } from './angles.ts'
export { NOMINAL_NORTH, NOMINAL_UP, NOMINAL_EAST, EARTH_RADIUS_KM, KM_PER_MODEL_UNIT, ROTATION_EPSILON } from './constants.ts'
export { IDENTITY_ROTATION, axisAngle, fromPacked, toPacked, isIdentityRotation, negateRotation, rotationMatrix, rotateVector, toQuaternion, composeRotations, rotationAngleBetween, rotationToBecome } from './rotation.ts'
export type { AxisAngle } from './rotation.ts'
export { toDirection, elevationOf, azimuthOf, skyPositionOf, headingToVector, orthogonalComponent, separationAngleDegrees } from './direction.ts'
export type { SkyPosition } from './direction.ts'
export { skyPositionsByName, observationsAt, formatObservation } from './observation.ts'
export type { StarObservation } from './observation.ts'
export { makeSurfaceSquare, squareFromRotation, withStarObservations, ROTATION_COMMANDS, rotateSquare, applyRotationCommand, celestialNorth, describeSquare } from './surface-square.ts'
export type { SurfaceSquare, SurfaceSquareParams, RotatedSquareParams, RotationCommand, RotationCommandName } from './surface-square.ts'
export { SquareCollection } from './square-collection.ts'
export type { SquareEntry } from './square-collection.ts'
export { DEFAULT_FRAME_OPTIONS, localFrameAt, rotationFromNominalFrame, buildPatch, patchBuilder } from './local-frame.ts'
export type { PointFunction, FrameOptions, LocalFrame } from './local-frame.ts'
export { StarGenerator } from './star-generator.ts'
export type { StarMap, StarDistances } from './star-generator.ts'
export { sphericalSeparationAngle, latLongPairHeading, greatCircleTravel, surfaceTravel } from './travel.ts'
export type { TravelObservation } from './travel.ts'
export { DEFAULT_CURVATURE_CONSTANTS, CurvatureCalculator, curvatureFromNormals, travelInputsFromLatLong } from './curvature.ts'
export type { CurvatureInputs, CurvatureSteps, CurvatureResult, CurvatureConstants } from './curvature.ts'
export { CatalogParseError, parseRightAscension, parseDeclination, parseCatalogEntry, loadStarCatalog, unixTimeToGmstHours, observeCatalogStar } from './star-catalog.ts'
export type { CatalogEntry } from './star-catalog.ts'
export {
  REFERENCE_LATITUDE, REFERENCE_LONGITUDE, MANUAL_OBSERVATION_TIME, MANUAL_OBSERVATIONS, CLOSE_STAR_DISTANCES,
  manifoldStarMap, sphericalEarthPoint, azimuthalEquidistantPoint, bowlPoint, saddlePoint,
  catalogStarSource, generatedStarSource, greatCircleTravelSource, surfaceTravelSource, surfaceModel, referenceStarMap,
  realWorld, closeStarWorld, azimuthalEquidistantWorld, bowlWorld, saddleWorld,
  WORLD_MODELS, createWorldModel,
} from './world-models.ts'
export type { StarSource, TravelSource, SurfaceModel, WorldModel, WorldModelName, CatalogStarSourceOptions } from './world-models.ts'
