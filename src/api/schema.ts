import { z } from "zod";

export const RegisterAccessPointSchema = z
  .object({
    id: z.string().min(1),
    channel: z.number().int().safe(),
    power_db: z.number().int().safe(),
    last_change_time_minutes: z.number().int().safe().optional()
  })
  .strict();

export const ChangeRequestBodySchema = z
  .object({
    new_channel: z.number().int().safe().optional(),
    new_power_db: z.number().int().safe().optional(),
    is_emergency: z.boolean().default(false),
    current_time_minutes: z.number().int().safe(),
    is_peak_hour: z.boolean(),
    dry_run: z.boolean().default(false)
  })
  .strict();

