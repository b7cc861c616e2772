import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { NetworkStateStore } from "./state/networkStore.js";

const AccessPointSeedSchema = z.object({
  id: z.string().min(1),
  channel: z.number().int().safe(),
  power_db: z.number().int().safe(),
  last_change_time_minutes: z.number().int().safe().optional()
});

const NetworkDetailsSchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1),
  notes: z.string().optional()
});

const NetworkConfigSchema = z
  .object({
    network: NetworkDetailsSchema,
    access_points: z.array(AccessPointSeedSchema)
  })
  .superRefine((cfg, ctx) => {
    const seen = new Set<string>();
    cfg.access_points.forEach((ap, idx) => {
      if (seen.has(ap.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["access_points", idx, "id"],
          message: `duplicate access point id '${ap.id}'`
        });
      }
      seen.add(ap.id);
    });
  });

export type NetworkConfig = z.infer<typeof NetworkConfigSchema> & { sourcePath: string };

export function loadNetworkConfig(networkConfigPath: string): NetworkConfig {
  const resolvedPath = path.resolve(networkConfigPath);
  let raw: string;
  try {
    raw = fs.readFileSync(resolvedPath, "utf-8");
  } catch (e: unknown) {
    throw new Error(`Failed to read network config at ${resolvedPath}: ${errorMessage(e)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e: unknown) {
    throw new Error(`Network config JSON parse error (${resolvedPath}): ${errorMessage(e)}`);
  }

  const validated = NetworkConfigSchema.safeParse(parsed);
  if (!validated.success) {
    throw new Error(`Network config validation error (${resolvedPath}): ${validated.error.message}`);
  }
  return { ...validated.data, sourcePath: resolvedPath };
}

export function seedStore(store: NetworkStateStore, networkConfig: NetworkConfig): number {
  for (const ap of networkConfig.access_points) {
    store.add(ap);
  }
  return networkConfig.access_points.length;
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
