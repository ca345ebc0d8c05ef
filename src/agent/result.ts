import { z } from "zod";
import { STATE_MERGE } from "../graphs/registry";
import { type SessionState } from "../graphs/state";
import { ActionDescriptorSchema, ImageArtifactSchema, UIElementSchema } from "./collaborators";
import { INTENTS, type PlanStep, PlanStepSchema } from "./intent";

export const ActionRecordSchema = z.object({
    /** Position of the plan step the action belongs to. */
    step: z.number().int().nonnegative(),
    action: ActionDescriptorSchema,
    success: z.boolean(),
    observed: z.string().optional(),
});
export type ActionRecord = z.infer<typeof ActionRecordSchema>;

/**
 * Result payload of the vision agent. `elements` collects every detection of
 * the session; `targets` holds the elements located for the current plan step
 * only and is replaced by each analysis.
 */
export const VisionResultSchema = z.object({
    intent: z.enum(INTENTS).optional(),
    plan: z.array(PlanStepSchema).default([]),
    /** Index into `plan` of the step being worked on. */
    cursor: z.number().int().nonnegative().default(0),
    screenshots: z.array(ImageArtifactSchema).default([]),
    elements: z.array(UIElementSchema).default([]),
    targets: z.array(UIElementSchema).default([])
        .register(STATE_MERGE, { merge: (_old, change) => change }),
    actionResults: z.array(ActionRecordSchema).default([]),
    verdict: z.string().optional(),
});
export type VisionResult = z.infer<typeof VisionResultSchema>;
export type VisionState = SessionState<VisionResult>;

export function currentStep(state: Readonly<VisionState>): PlanStep | undefined {
    return state.result.plan[state.result.cursor];
}
