import { z } from "zod";

export const PointSchema = z.object({
    x: z.number(),
    y: z.number(),
});
export type Point = z.infer<typeof PointSchema>;

export const BoundsSchema = z.object({
    x: z.number(),
    y: z.number(),
    width: z.number().nonnegative(),
    height: z.number().nonnegative(),
});
export type Bounds = z.infer<typeof BoundsSchema>;

/**
 * An element the vision service found on screen.
 */
export const UIElementSchema = z.object({
    id: z.string(),
    type: z.string(),
    label: z.string().optional(),
    bounds: BoundsSchema,
    confidence: z.number().min(0).max(1),
});
export type UIElement = z.infer<typeof UIElementSchema>;

/**
 * Reference to a captured image. Pixels stay with the capture service.
 */
export const ImageArtifactSchema = z.object({
    id: z.string(),
    uri: z.string(),
    width: z.number().int().positive(),
    height: z.number().int().positive(),
});
export type ImageArtifact = z.infer<typeof ImageArtifactSchema>;

export const ActionDescriptorSchema = z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("click"), x: z.number(), y: z.number() }),
    z.object({ kind: z.literal("double_click"), x: z.number(), y: z.number() }),
    z.object({ kind: z.literal("right_click"), x: z.number(), y: z.number() }),
    z.object({ kind: z.literal("type"), text: z.string() }),
    z.object({ kind: z.literal("key_combo"), keys: z.array(z.string()).min(1) }),
    z.object({
        kind: z.literal("scroll"),
        direction: z.enum(["up", "down", "left", "right"]),
        amount: z.number().int().positive(),
    }),
    z.object({ kind: z.literal("drag"), from: PointSchema, to: PointSchema }),
    z.object({ kind: z.literal("open_app"), app: z.string().min(1) }),
    z.object({ kind: z.literal("close_app"), app: z.string().min(1) }),
]);
export type ActionDescriptor = z.infer<typeof ActionDescriptorSchema>;

export interface VisionRequest {
    image: ImageArtifact;
    prompt: string;
}

export interface VisionAnalysis {
    elements: UIElement[];
    /** Free-text description of what the model saw. */
    text: string;
}

/**
 * Vision-model inference. Failures are thrown.
 */
export interface VisionService {
    analyze(request: VisionRequest, signal: AbortSignal): Promise<VisionAnalysis>;
}

export interface Capture {
    image: ImageArtifact;
    metadata: Record<string, unknown>;
}

export interface CaptureService {
    /** Captures the whole screen when no region is given. */
    capture(region: Bounds | undefined, signal: AbortSignal): Promise<Capture>;
}

export interface ActionOutcome {
    success: boolean;
    observed?: string;
}

export interface ActionService {
    execute(action: ActionDescriptor, signal: AbortSignal): Promise<ActionOutcome>;
}

export interface AgentCollaborators {
    vision: VisionService;
    capture: CaptureService;
    actions: ActionService;
}
