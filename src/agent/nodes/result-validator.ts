import { complete, update } from "../../nodes/output";
import { type NodeLike, type NodeOutput } from "../../nodes/types";
import { type NodeContext } from "../../graphs/runtime-context";
import { type AgentCollaborators } from "../collaborators";
import { currentStep, type VisionResult, type VisionState } from "../result";

/**
 * Checks what the current plan step produced and either moves the cursor to
 * the next step or ends the session.
 */
export class ResultValidator implements NodeLike<VisionResult, AgentCollaborators> {
    async run(state: Readonly<VisionState>, _context: NodeContext<AgentCollaborators>): Promise<NodeOutput<VisionResult>> {
        const { cursor, plan, actionResults, verdict } = state.result;
        const step = currentStep(state);
        if (step === undefined) {
            return complete<VisionResult>("failure", {}, `No plan step at position ${cursor}`);
        }
        if (step.intent === "analyze") {
            if (verdict === undefined) {
                return complete<VisionResult>("failure", {}, "Analysis produced no answer");
            }
        } else {
            const records = actionResults.filter((record) => record.step === cursor);
            if (records.length === 0) {
                return complete<VisionResult>("failure", {}, `Step "${step.description}" executed no action`);
            }
            const failed = records.find((record) => !record.success);
            if (failed !== undefined) {
                const observed = failed.observed === undefined ? "" : `: ${failed.observed}`;
                return complete<VisionResult>("failure", {}, `Action ${failed.action.kind} did not succeed${observed}`);
            }
        }
        const next = cursor + 1;
        if (next < plan.length) {
            return update<VisionResult>({ cursor: next });
        }
        return step.intent === "analyze"
            ? complete<VisionResult>("success", { cursor: next })
            : complete<VisionResult>("success", { cursor: next, verdict: `Completed ${plan.length} step(s)` });
    }
}
