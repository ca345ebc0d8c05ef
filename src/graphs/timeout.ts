import { NodeTimeout } from "../errors";

/**
 * Runs `operation` with a deadline. On expiry the signal handed to the
 * operation is aborted and the returned promise rejects with `NodeTimeout`;
 * whatever the operation settles with afterwards is ignored.
 */
export async function withTimeout<T>(
    node: string,
    timeoutMs: number,
    operation: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            const error = new NodeTimeout(node, timeoutMs);
            controller.abort(error);
            reject(error);
        }, timeoutMs);
    });
    try {
        return await Promise.race([operation(controller.signal), deadline]);
    } finally {
        clearTimeout(timer);
    }
}
