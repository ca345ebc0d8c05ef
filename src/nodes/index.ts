export { FunctionNode, makeNode, type NodeFunction } from "./function-node";
export { complete, fail, update } from "./output";
export { type Completion, type NodeFailure, type NodeLike, type NodeOutput, type NodeUpdate } from "./types";
