/**
 * PillTrack Edge - Brew Tracker response schemas
 *
 * Runtime schemas for every response body the REST client reads.
 * Ids come back as numbers or strings depending on the endpoint; they are
 * normalised to strings.
 */

import { z } from "zod";

const IdSchema = z.union([z.string().min(1), z.number()]).transform((id) => String(id));

export const LoginResponseSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1),
});

export const RefreshResponseSchema = z.object({
  accessToken: z.string().min(1),
});

export const DeviceTokenResponseSchema = z.object({
  token: z.string().nullish(),
});

export const HydrometerSchema = z
  .object({
    id: IdSchema,
    device_name: z.string().nullish(),
  })
  .passthrough()
  .transform((raw) => ({
    id: raw.id,
    deviceName: raw.device_name ?? null,
  }));

export type HydrometerRecord = z.infer<typeof HydrometerSchema>;

export const HydrometerListResponseSchema = z.object({
  devices: z.array(HydrometerSchema),
});

export const RegisterHydrometerResponseSchema = z.object({
  id: IdSchema,
});

export const BrewSchema = z
  .object({
    id: IdSchema,
    name: z.string().nullish(),
    brew_name: z.string().nullish(),
    end_date: z.string().nullish(),
    recipe_id: z.union([z.string(), z.number()]).nullish(),
  })
  .passthrough()
  .transform((raw) => ({
    id: raw.id,
    name: raw.name ?? raw.brew_name ?? null,
    endDate: raw.end_date ?? null,
    recipeId: raw.recipe_id ?? null,
  }));

export type BrewRecord = z.infer<typeof BrewSchema>;

export const BrewListResponseSchema = z.array(BrewSchema);

/** POST /hydrometer/brew answers with the new brew, or with the brew list */
export const RegisterBrewResponseSchema = z.union([BrewSchema, z.array(BrewSchema)]);
