export { createPlaceEngine, NER_PROFILE, type PlaceEngine, type PlaceEngineOptions } from './engine';
export * from './services/contextClassifier';
export * from './services/coordinator';
export * from './services/geocoding';
export * from './services/knowledge';
export * from './services/pipeline';
export * from './services/placeExtraction';
export * from './services/sentences';
export * from './services/sink';
export * from './types/places';
export * from './utils/errors';
export { createDatabase, type DatabaseConnection } from './config/database';
