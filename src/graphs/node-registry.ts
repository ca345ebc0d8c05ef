import { DuplicateNodeError, FatalConfigurationError, UnknownNodeError } from "../errors";

export const START = "start";
export const END = "end";

/**
 * Name → node map filled while a graph is built and read-only once compiled.
 * Nothing can be registered after `compile()`, so lookups during execution
 * need no coordination.
 */
export class NodeRegistry<N> {
    private readonly nodes = new Map<string, N>();
    private compiled = false;

    get isCompiled(): boolean {
        return this.compiled;
    }

    get size(): number {
        return this.nodes.size;
    }

    /**
     * @throws {FatalConfigurationError} If the name is reserved or the registry is compiled
     * @throws {DuplicateNodeError} If the name is taken
     */
    register(name: string, node: N): this {
        if (this.compiled) {
            throw new FatalConfigurationError(`Cannot register node ${name}: registry is compiled`);
        }
        if (name === START || name === END) {
            throw new FatalConfigurationError(`Node name ${name} is reserved`);
        }
        if (name.length === 0) {
            throw new FatalConfigurationError("Node name must not be empty");
        }
        if (this.nodes.has(name)) {
            throw new DuplicateNodeError(name);
        }
        this.nodes.set(name, node);
        return this;
    }

    compile(): this {
        this.compiled = true;
        return this;
    }

    has(name: string): boolean {
        return this.nodes.has(name);
    }

    /**
     * @throws {UnknownNodeError} If nothing is registered under `name`
     */
    get(name: string): N {
        const node = this.nodes.get(name);
        if (node === undefined) {
            throw new UnknownNodeError(name);
        }
        return node;
    }

    names(): string[] {
        return [...this.nodes.keys()];
    }
}
