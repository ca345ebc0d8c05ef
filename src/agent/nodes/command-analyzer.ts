import { complete, update } from "../../nodes/output";
import { type NodeLike, type NodeOutput } from "../../nodes/types";
import { type NodeContext } from "../../graphs/runtime-context";
import { type AgentCollaborators } from "../collaborators";
import { parseCommand } from "../intent";
import { type VisionResult, type VisionState } from "../result";

/**
 * Turns the session command into an action plan. A command that cannot be
 * understood ends the session with a failure verdict; retrying would parse
 * the same text again.
 */
export class CommandAnalyzer implements NodeLike<VisionResult, AgentCollaborators> {
    async run(state: Readonly<VisionState>, context: NodeContext<AgentCollaborators>): Promise<NodeOutput<VisionResult>> {
        const plan = parseCommand(state.command);
        const first = plan[0];
        if (first === undefined) {
            return complete<VisionResult>("failure", {}, `Could not understand command "${state.command}"`);
        }
        context.logger.info(`Planned ${plan.length} step(s): ${plan.map((step) => step.intent).join(", ")}`);
        return update<VisionResult>({ intent: first.intent, plan, cursor: 0 });
    }
}
