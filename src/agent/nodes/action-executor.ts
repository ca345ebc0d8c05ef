import { fail, update } from "../../nodes/output";
import { type NodeLike, type NodeOutput } from "../../nodes/types";
import { type NodeContext } from "../../graphs/runtime-context";
import { type ActionDescriptor, type AgentCollaborators, type Bounds, type Point, type UIElement } from "../collaborators";
import { type PlanStep, targetsOf } from "../intent";
import { type ActionRecord, currentStep, type VisionResult, type VisionState } from "../result";

export function centerOf(bounds: Bounds): Point {
    return {
        x: Math.round(bounds.x + bounds.width / 2),
        y: Math.round(bounds.y + bounds.height / 2),
    };
}

/**
 * Input actions for one plan step. `targets` holds the located elements in
 * the order `targetsOf(step)` names them.
 */
export function actionsFor(step: PlanStep, targets: readonly UIElement[]): ActionDescriptor[] {
    const [first, second] = targets;
    switch (step.intent) {
        case "click": {
            if (first === undefined) return [];
            const kind = step.button === "double" ? "double_click" : step.button === "right" ? "right_click" : "click";
            return [{ kind, ...centerOf(first.bounds) }];
        }
        case "type":
            return first === undefined || step.target === undefined
                ? [{ kind: "type", text: step.text }]
                : [{ kind: "click", ...centerOf(first.bounds) }, { kind: "type", text: step.text }];
        case "scroll":
            return [{ kind: "scroll", direction: step.direction, amount: step.amount }];
        case "drag":
            if (first === undefined || second === undefined) return [];
            return [{ kind: "drag", from: centerOf(first.bounds), to: centerOf(second.bounds) }];
        case "key_combo":
            return [{ kind: "key_combo", keys: step.keys }];
        case "open_app":
            return [{ kind: "open_app", app: step.app }];
        case "close_app":
            return [{ kind: "close_app", app: step.app }];
        case "analyze":
            return [];
    }
}

/**
 * Executes the current plan step. Stops at the first action that reports no
 * success and leaves the verdict to the validator.
 */
export class ActionExecutor implements NodeLike<VisionResult, AgentCollaborators> {
    async run(state: Readonly<VisionState>, context: NodeContext<AgentCollaborators>): Promise<NodeOutput<VisionResult>> {
        const step = currentStep(state);
        if (step === undefined) {
            return fail(`No plan step at position ${state.result.cursor}`);
        }
        const needed = targetsOf(step).length;
        if (state.result.targets.length < needed) {
            return fail(`Step "${step.description}" needs ${needed} located element(s), found ${state.result.targets.length}`);
        }
        const records: ActionRecord[] = [];
        for (const action of actionsFor(step, state.result.targets)) {
            try {
                const outcome = await context.collaborators.actions.execute(action, context.signal);
                records.push(outcome.observed === undefined
                    ? { step: state.result.cursor, action, success: outcome.success }
                    : { step: state.result.cursor, action, success: outcome.success, observed: outcome.observed });
                if (!outcome.success) {
                    break;
                }
            } catch (error) {
                return fail(`Action ${action.kind} failed: ${error instanceof Error ? error.message : String(error)}`);
            }
        }
        return update<VisionResult>({ actionResults: records });
    }
}
