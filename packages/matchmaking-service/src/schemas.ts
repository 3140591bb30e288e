import { z } from 'zod';
import { CONTACT_PREFERENCES, SPORTS, TIME_SLOTS } from './types.js';
import { DEFAULT_RADIUS_KM, MAX_RADIUS_KM, MIN_RADIUS_KM } from './proximity.js';

// Query values arrive as strings; a blank one counts as not given.
const blankToUndefined = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

// Request bodies

export const TeamCreateSchema = z.object({
  teamName: z.string().trim().min(1),
  sport: z.enum(SPORTS),
  players: z.array(z.string().trim().min(1)).default([]),
  locationName: z.string().trim().nullish(),
  latitude: z.number().min(-90).max(90).nullish(),
  longitude: z.number().min(-180).max(180).nullish(),
  contactPreference: z.enum(CONTACT_PREFERENCES),
  contactNumber: z.string().trim(),
  availability: z.array(z.enum(TIME_SLOTS)).default([])
});

export const MatchPostCreateSchema = z.object({
  teamId: z.string().trim().min(1),
  sport: z.enum(SPORTS),
  numPlayers: z.number().int().min(1),
  timePref: z.enum(TIME_SLOTS),
  note: z.string().nullish()
});

export const MessageCreateSchema = z.object({
  fromTeamId: z.string().trim().min(1),
  toTeamId: z.string().trim().min(1),
  text: z.string().min(1).max(2000)
});

// Query strings

export const SportQuerySchema = z.object({
  sport: z.preprocess(blankToUndefined, z.enum(SPORTS).optional())
});

export const NearbyQuerySchema = SportQuerySchema.extend({
  centerLat: z.preprocess(blankToUndefined, z.coerce.number().min(-90).max(90).optional()),
  centerLon: z.preprocess(blankToUndefined, z.coerce.number().min(-180).max(180).optional()),
  radiusKm: z.preprocess(
    blankToUndefined,
    z.coerce.number().min(MIN_RADIUS_KM).max(MAX_RADIUS_KM).default(DEFAULT_RADIUS_KM)
  )
});

// Stored documents. Coordinates that no longer parse are read back as absent.

const storedCoordinate = z.number().nullish().catch(null);

export const TeamRecordSchema = z.object({
  teamId: z.string(),
  teamName: z.string(),
  sport: z.enum(SPORTS),
  players: z.array(z.string()).default([]),
  locationName: z.string().nullish(),
  latitude: storedCoordinate,
  longitude: storedCoordinate,
  contactPreference: z.enum(CONTACT_PREFERENCES),
  contactNumber: z.string(),
  availability: z.array(z.enum(TIME_SLOTS)).default([])
});

export const MatchPostRecordSchema = z.object({
  teamId: z.string(),
  sport: z.enum(SPORTS),
  numPlayers: z.number(),
  timePref: z.enum(TIME_SLOTS),
  note: z.string().nullish(),
  locationName: z.string().nullish(),
  latitude: storedCoordinate,
  longitude: storedCoordinate
});

export const MessageRecordSchema = z.object({
  fromTeamId: z.string(),
  toTeamId: z.string(),
  text: z.string()
});
