import { readFileSync } from "node:fs";

import { z } from "zod";

const packageSchema = z.object({ version: z.string().min(1) }).passthrough();

/**
 * Reads the gateway version from the package manifest next to sources/.
 */
export function packageVersion(): string {
    const raw: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
    return packageSchema.parse(raw).version;
}
