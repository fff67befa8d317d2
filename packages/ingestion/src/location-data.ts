import { fileURLToPath } from 'node:url';
import { join } from 'node:path';
import { z } from 'zod';
import { readConfigFile } from './config-files.js';

export const DEFAULT_DATA_DIR = fileURLToPath(new URL('../data/', import.meta.url));

export const usStateSchema = z.object({
  code: z.string().regex(/^[A-Z]{2}$/),
  name: z.string().trim().min(1),
  aliases: z.array(z.string().trim().min(1)).optional(),
});

export const nonUsMarkerSchema = z.object({
  term: z.string().trim().min(1),
  country: z
    .string()
    .regex(/^[A-Z]{2}$/)
    .nullable(),
});

export const metroAreaSchema = z.object({
  city: z.string().trim().min(1),
  state: z.string().regex(/^[A-Z]{2}$/),
  msa: z.string().trim().min(1),
});

export type UsState = z.infer<typeof usStateSchema>;
export type NonUsMarker = z.infer<typeof nonUsMarkerSchema>;
export type MetroArea = z.infer<typeof metroAreaSchema>;

export interface LocationData {
  states: UsState[];
  nonUsMarkers: NonUsMarker[];
  metroAreas: MetroArea[];
}

export function loadLocationData(dataDir: string = DEFAULT_DATA_DIR): LocationData {
  return {
    states: readConfigFile(join(dataDir, 'us-states.json'), z.array(usStateSchema).min(1)),
    nonUsMarkers: readConfigFile(join(dataDir, 'non-us-markers.json'), z.array(nonUsMarkerSchema)),
    metroAreas: readConfigFile(join(dataDir, 'metro-areas.json'), z.array(metroAreaSchema)),
  };
}
