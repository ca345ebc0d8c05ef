import { fail, update } from "../../nodes/output";
import { type NodeLike, type NodeOutput } from "../../nodes/types";
import { type NodeContext } from "../../graphs/runtime-context";
import { type AgentCollaborators } from "../collaborators";
import { type VisionResult, type VisionState } from "../result";

export class ScreenCapture implements NodeLike<VisionResult, AgentCollaborators> {
    async run(_state: Readonly<VisionState>, context: NodeContext<AgentCollaborators>): Promise<NodeOutput<VisionResult>> {
        try {
            const { image } = await context.collaborators.capture.capture(undefined, context.signal);
            return update<VisionResult>({ screenshots: [image] });
        } catch (error) {
            return fail(`Screen capture failed: ${error instanceof Error ? error.message : String(error)}`);
        }
    }
}
