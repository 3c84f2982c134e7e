/**
 * Graphs: LangGraph agent definitions and registry.
 *
 * Importing this module registers the built-in graphs.
 *
 *   import { resolveGraphFactory, getAvailableGraphIds } from "../graphs";
 *
 *   const factory = resolveGraphFactory(body.graph_id);
 *   const compiled = await factory(config, { checkpointer, store });
 */

export {
  registerGraph,
  resolveGraphFactory,
  resolveGraphId,
  getAvailableGraphIds,
  isGraphRegistered,
  resetRegistry,
} from "./registry";

export { DEFAULT_GRAPH_ID, type GraphFactory, type GraphFactoryOptions } from "./types";
