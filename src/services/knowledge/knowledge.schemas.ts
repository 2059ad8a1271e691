/**
 * zod schemas for the knowledge table files.
 * Every table must be non-empty: an empty table silently disables a category.
 */

import { z } from 'zod';

const confidence = z.number().min(0).max(1);
const nonEmptyString = z.string().min(1);

const levelSchema = z
  .object({
    minLength: z.number().int().min(1),
    maxLength: z.number().int().min(1),
    suffixes: z.array(nonEmptyString).nonempty(),
  })
  .refine((level) => level.minLength <= level.maxLength, {
    message: 'minLength must not exceed maxLength',
  });

export const regionsFileSchema = z.object({
  version: z.number().int(),
  regions: z.array(nonEmptyString).nonempty(),
});

export const hierarchyFileSchema = z.object({
  version: z.number().int(),
  kanjiClass: nonEmptyString,
  levels: z.object({
    subRegion: levelSchema,
    localityAfterSubRegion: levelSchema,
    localityAfterRegion: levelSchema,
    city: levelSchema,
    ward: levelSchema,
  }),
  wardCities: z.array(nonEmptyString).default([]),
  confidence: z.object({
    region_subregion_locality: confidence,
    region_locality: confidence,
    locality_ward: confidence,
  }),
  boundary: z.object({
    characters: nonEmptyString,
    properNameWindow: z.number().int().min(0),
    properNameMarkers: z.array(nonEmptyString),
    compoundContinuations: z.array(nonEmptyString),
  }),
});

export const contextRulesFileSchema = z.object({
  version: z.number().int(),
  rules: z
    .array(
      z.object({
        pattern: nonEmptyString,
        category: z.enum(['direction', 'plant', 'building_part', 'generic_noun']),
        confidence,
      })
    )
    .nonempty(),
});

export const indicatorsFileSchema = z.object({
  version: z.number().int(),
  place: z.array(nonEmptyString).nonempty(),
  person: z.array(nonEmptyString).nonempty(),
  historical: z.array(nonEmptyString).nonempty(),
  scoring: z.object({
    defaultPlaceBias: z.number().min(0),
    personFloor: z.number().min(0),
    baseConfidence: confidence,
    perIndicator: confidence,
    maxConfidence: confidence,
    noIndicatorConfidence: confidence,
  }),
});

export const ambiguousFileSchema = z.object({
  version: z.number().int(),
  personThreshold: z.number().int().min(1),
  personLikelihoodFloor: confidence,
  defaultPersonLikelihood: confidence,
  classificationConfidence: confidence,
  places: z
    .record(
      nonEmptyString,
      z.object({
        personLikelihood: confidence.optional(),
        modernPlace: nonEmptyString,
      })
    )
    .refine((places) => Object.keys(places).length > 0, { message: 'places must not be empty' }),
});

export const classicalFileSchema = z.object({
  version: z.number().int(),
  provinceMarker: nonEmptyString,
  classificationConfidence: confidence,
  places: z
    .record(
      nonEmptyString,
      z.object({
        classicalUsage: z.string(),
        modernRegion: nonEmptyString,
        latitude: z.number().min(-90).max(90),
        longitude: z.number().min(-180).max(180),
        keywords: z.array(nonEmptyString).nonempty(),
      })
    )
    .refine((places) => Object.keys(places).length > 0, { message: 'places must not be empty' }),
});

const gazetteerEntrySchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  region: nonEmptyString,
});

export const gazetteersFileSchema = z.object({
  version: z.number().int(),
  tables: z
    .array(
      z.object({
        id: nonEmptyString,
        confidence,
        entries: z
          .record(nonEmptyString, gazetteerEntrySchema)
          .refine((entries) => Object.keys(entries).length > 0, {
            message: 'entries must not be empty',
          }),
      })
    )
    .nonempty(),
});

export const extractorsFileSchema = z.object({
  version: z.number().int(),
  profiles: z
    .record(
      nonEmptyString,
      z.object({
        priority: z.number().int(),
        trustThreshold: confidence,
        baseReliability: confidence,
      })
    )
    .refine((profiles) => Object.keys(profiles).length > 0, {
      message: 'profiles must not be empty',
    }),
  classification: z.object({
    classifyTrustedSources: z.boolean(),
    placeMultiplier: z.number().positive(),
    nonPlaceMultiplier: z.number().min(0),
  }),
  fallback: z.object({
    confidenceMultiplier: z.number().min(0),
    denyList: z.object({
      direction: z.array(nonEmptyString),
      plant: z.array(nonEmptyString),
      generic_noun: z.array(nonEmptyString),
    }),
  }),
});
