import { z } from "zod";

/**
 * Per-field merge overrides for result schemas. A field registered here is
 * merged with its own function instead of the default rules.
 */
export const STATE_MERGE = z.registry<{ merge: (old: z.$output, change: z.$output) => z.$output }>();
