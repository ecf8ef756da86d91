import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { type RankConfig, loadConfig, resolveGraphPath } from './src/config.js';
import { formatRanks } from './src/format.js';
import { type Link, buildGraph, describeGraph, loadGraph } from './src/graph_load.js';
import { markovMixing } from './src/markov.js';
import { randomSurfer } from './src/pagerank.js';
import { createSeededRandom } from './src/random.js';
import { computeTransition } from './src/transition.js';
import { type DanglingPolicy, type Graph, type RankMode, DANGLING_POLICIES, isDanglingPolicy } from './src/types.js';

export const SERVER_VERSION = "0.1.0";

type ToolArgs = Record<string, unknown>;

export interface RankResult {
  mode: RankMode;
  steps: number;
  ranks: number[];
  formatted: string;
}

// Shared JSON schema fragments for the two ways of naming a graph
const graphSourceProperties = {
  path: {
    type: "string",
    description: "Path to a graph file (first line: node count, then whitespace-separated 'u v' link pairs). Relative paths resolve against PAGERANK_GRAPH_DIR.",
  },
  nodeCount: { type: "integer", minimum: 1, description: "Number of nodes, when passing links inline" },
  links: {
    type: "array",
    items: {
      type: "array",
      items: { type: "integer", minimum: 0 },
      minItems: 2,
      maxItems: 2,
    },
    description: "Inline links as [from, to] pairs. Repeated pairs add weight.",
  },
};

const transitionProperties = {
  damping: { type: "number", minimum: 0, maximum: 1, description: "Probability of following a link instead of teleporting. Default 0.9." },
  dangling: { type: "string", enum: [...DANGLING_POLICIES], description: "How to treat nodes without outbound links. Default 'reject'." },
};

function optionalNumber(args: ToolArgs, key: string): number | undefined {
  const value = args[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number") {
    throw new Error(`Argument "${key}" must be a number`);
  }
  return value;
}

function requireNumber(args: ToolArgs, key: string): number {
  const value = optionalNumber(args, key);
  if (value === undefined) {
    throw new Error(`Missing required argument "${key}"`);
  }
  return value;
}

function optionalDangling(args: ToolArgs): DanglingPolicy | undefined {
  const value = args.dangling;
  if (value === undefined) return undefined;
  if (!isDanglingPolicy(value)) {
    throw new Error(`Argument "dangling" must be one of ${DANGLING_POLICIES.join(", ")}`);
  }
  return value;
}

function parseMode(value: unknown): RankMode {
  if (value === "random_surfer" || value === "markov_mixing") return value;
  throw new Error(`Argument "mode" must be "random_surfer" or "markov_mixing"`);
}

function toLink(item: unknown, index: number): Link {
  if (!Array.isArray(item) || item.length !== 2) {
    throw new Error(`Link ${index} must be a [from, to] pair`);
  }
  const [u, v]: unknown[] = item;
  if (typeof u !== "number" || typeof v !== "number") {
    throw new Error(`Link ${index} must contain two node ids`);
  }
  return [u, v];
}

/**
 * Manages graph loading and rank computation for the MCP tools.
 * Per-call arguments override the configured defaults.
 */
export class RankManager {
  constructor(private readonly config: RankConfig) {}

  async resolveGraph(args: ToolArgs): Promise<Graph> {
    if (typeof args.path === "string") {
      return loadGraph(resolveGraphPath(this.config, args.path));
    }
    if (args.nodeCount !== undefined || args.links !== undefined) {
      const nodeCount = requireNumber(args, "nodeCount");
      const links = args.links ?? [];
      if (!Array.isArray(links)) {
        throw new Error(`Argument "links" must be an array of [from, to] pairs`);
      }
      return buildGraph(nodeCount, links.map(toLink));
    }
    throw new Error(`Provide either "path" or "nodeCount" and "links"`);
  }

  async describe(args: ToolArgs) {
    return describeGraph(await this.resolveGraph(args));
  }

  async transition(args: ToolArgs) {
    const graph = await this.resolveGraph(args);
    const damping = optionalNumber(args, "damping") ?? this.config.damping;
    const matrix = computeTransition(graph.counts, graph.outDegree, {
      damping,
      dangling: optionalDangling(args) ?? this.config.dangling,
    });
    return { nodeCount: matrix.length, damping, matrix };
  }

  async rank(args: ToolArgs): Promise<RankResult> {
    const mode = parseMode(args.mode);
    const steps = requireNumber(args, "steps");
    const startNode = optionalNumber(args, "startNode");
    const seed = optionalNumber(args, "seed") ?? this.config.seed;

    const { matrix } = await this.transition(args);

    const ranks = mode === "random_surfer"
      ? randomSurfer(matrix, steps, {
          startNode,
          random: seed === undefined ? undefined : createSeededRandom(seed),
        })
      : markovMixing(matrix, steps, { startNode });

    return { mode, steps, ranks, formatted: formatRanks(ranks).trimEnd() };
  }
}

/**
 * Creates a configured MCP server instance with all tools registered.
 * @param config Optional configuration; keys left out are read from the PAGERANK_* environment variables
 */
export function createServer(config?: Partial<RankConfig>): Server {
  const rankManager = new RankManager(loadConfig(process.env, config));

  const server = new Server({
    name: "markov-rank",
    version: SERVER_VERSION,
  }, {
    capabilities: {
      tools: {},
    },
  });

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: [
        {
          name: "describe_graph",
          description: "Summarize a link graph: node and link counts, in/out-degrees, and nodes with no outbound links",
          inputSchema: {
            type: "object",
            properties: { ...graphSourceProperties },
          },
        },
        {
          name: "compute_transition",
          description: "Compute the row-stochastic transition matrix of a link graph (follow a link with probability damping, otherwise jump to a uniformly random node)",
          inputSchema: {
            type: "object",
            properties: { ...graphSourceProperties, ...transitionProperties },
          },
        },
        {
          name: "rank_graph",
          description: "Rank the nodes of a link graph, either by simulating a random surfer or by Markov mixing (power iteration) of a probability distribution",
          inputSchema: {
            type: "object",
            properties: {
              ...graphSourceProperties,
              ...transitionProperties,
              mode: { type: "string", enum: ["random_surfer", "markov_mixing"], description: "Ranking algorithm" },
              steps: { type: "integer", minimum: 0, description: "Number of surfer moves, or number of matrix multiplications" },
              startNode: { type: "integer", minimum: 0, description: "Node the walk or distribution starts on. Default 0." },
              seed: { type: "integer", description: "Seed for the random surfer. Defaults to PAGERANK_SEED, else unseeded." },
            },
            required: ["mode", "steps"],
          },
        },
      ],
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    if (!args) {
      throw new Error(`No arguments provided for tool: ${name}`);
    }

    switch (name) {
      case "describe_graph":
        return { content: [{ type: "text", text: JSON.stringify(await rankManager.describe(args), null, 2) }] };
      case "compute_transition":
        return { content: [{ type: "text", text: JSON.stringify(await rankManager.transition(args)) }] };
      case "rank_graph":
        return { content: [{ type: "text", text: JSON.stringify(await rankManager.rank(args), null, 2) }] };
      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  });

  return server;
}
