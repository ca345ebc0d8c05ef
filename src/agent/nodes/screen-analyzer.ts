import { fail, update } from "../../nodes/output";
import { type NodeLike, type NodeOutput } from "../../nodes/types";
import { type NodeContext } from "../../graphs/runtime-context";
import { type AgentCollaborators, type UIElement, type VisionAnalysis } from "../collaborators";
import { targetsOf } from "../intent";
import { currentStep, type VisionResult, type VisionState } from "../result";

/**
 * Picks the element whose label best matches `label`: exact matches first,
 * then labels contained in the query or containing it. Ties go to the higher
 * confidence, then to the earlier element.
 */
export function findElement(elements: readonly UIElement[], label: string): UIElement | undefined {
    const query = label.trim().toLowerCase();
    let best: { element: UIElement; score: number } | undefined;
    for (const element of elements) {
        const text = element.label?.trim().toLowerCase() ?? "";
        if (text.length === 0) {
            continue;
        }
        const exact = text === query;
        if (!exact && !query.includes(text) && !text.includes(query)) {
            continue;
        }
        const score = (exact ? 1 : 0) + element.confidence;
        if (best === undefined || score > best.score) {
            best = { element, score };
        }
    }
    return best?.element;
}

/**
 * Sends the latest screenshot to the vision service and locates the elements
 * the current plan step acts on.
 */
export class ScreenAnalyzer implements NodeLike<VisionResult, AgentCollaborators> {
    async run(state: Readonly<VisionState>, context: NodeContext<AgentCollaborators>): Promise<NodeOutput<VisionResult>> {
        const step = currentStep(state);
        if (step === undefined) {
            return fail(`No plan step at position ${state.result.cursor}`);
        }
        const image = state.result.screenshots.at(-1);
        if (image === undefined) {
            return fail("No screenshot to analyze");
        }
        const labels = targetsOf(step);
        const prompt = step.intent === "analyze"
            ? step.question
            : labels.length > 0
                ? `Locate the following elements: ${labels.join(", ")}`
                : "List the interactive elements on screen";

        let analysis: VisionAnalysis;
        try {
            analysis = await context.collaborators.vision.analyze({ image, prompt }, context.signal);
        } catch (error) {
            return fail(`Vision analysis failed: ${error instanceof Error ? error.message : String(error)}`);
        }

        if (step.intent === "analyze") {
            return update<VisionResult>({ elements: analysis.elements, targets: [], verdict: analysis.text });
        }
        const targets: UIElement[] = [];
        for (const label of labels) {
            const element = findElement(analysis.elements, label);
            if (element === undefined) {
                return fail(`No element matches "${label}"`, { seen: analysis.elements.map((candidate) => candidate.label ?? candidate.type) });
            }
            targets.push(element);
        }
        context.logger.debug(`Located ${targets.length} target(s) among ${analysis.elements.length} element(s)`);
        return update<VisionResult>({ elements: analysis.elements, targets });
    }
}
