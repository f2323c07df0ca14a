import { z, type ZodIssue } from "zod";

// =============================================================================
// CONSTANTS
// =============================================================================

export const AGENT_KINDS = [
  "build",
  "milestone",
  "plan",
  "architect",
  "fix",
  "test",
  "document",
  "explore",
] as const;

export const ECOSYSTEMS = ["python", "deno", "node", "go", "rust"] as const;

export const NOTIFY_EVENTS = ["task_complete", "task_failed", "pipeline_done"] as const;

export const TASK_FIELDS = [
  "id",
  "title",
  "agent",
  "ecosystem",
  "depends_on",
  "context",
  "outputs",
  "acceptance",
  "version",
  "description",
  "deploy",
  "review",
] as const;

export const DEPLOY_BLOCK_FIELDS = ["enabled", "script", "env"] as const;
export const GIT_BLOCK_FIELDS = ["enabled"] as const;

export type AgentKind = (typeof AGENT_KINDS)[number];
export type Ecosystem = (typeof ECOSYSTEMS)[number];
export type NotifyEventName = (typeof NOTIFY_EVENTS)[number];

// =============================================================================
// FIELD SCHEMAS
// =============================================================================

// Long text fields may be written as a list of lines.
const TextSchema = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (Array.isArray(value) ? value.join("\n") : value).trim());

// Outputs may be a comma-separated string or a list of paths.
const PathListSchema = z
  .union([z.string(), z.array(z.string())])
  .transform((value) =>
    (Array.isArray(value) ? value : value.split(","))
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0),
  );

export const RoadmapTaskSchema = z.object({
  id: z.number().int().min(1).max(999),
  title: z.string().transform((value) => value.trim()),
  agent: z.string().optional(),
  ecosystem: z.string().optional(),
  depends_on: z.array(z.number().int()).optional(),
  context: PathListSchema.optional(),
  outputs: PathListSchema.optional(),
  acceptance: TextSchema.optional(),
  version: z.string().optional(),
  description: TextSchema.optional(),
  deploy: z.boolean().optional(),
  review: z.boolean().optional(),
});

export type RoadmapTaskInput = z.input<typeof RoadmapTaskSchema>;
export type ParsedRoadmapTask = z.infer<typeof RoadmapTaskSchema>;

export type RoadmapTask = {
  id: number;
  title: string;
  agent?: string;
  ecosystem?: string;
  depends_on: number[];
  context: string[];
  outputs: string[];
  acceptance: string;
  version?: string;
  description: string;
  deploy: boolean;
  review?: boolean;
};

export function normalizeRoadmapTask(parsed: ParsedRoadmapTask): RoadmapTask {
  return {
    id: parsed.id,
    title: parsed.title,
    agent: parsed.agent,
    ecosystem: parsed.ecosystem,
    depends_on: [...new Set(parsed.depends_on ?? [])],
    context: parsed.context ?? [],
    outputs: parsed.outputs ?? [],
    acceptance: parsed.acceptance ?? "",
    version: parsed.version,
    description: parsed.description ?? "",
    deploy: parsed.deploy ?? false,
    review: parsed.review,
  };
}

const EnvValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export const DeployBlockSchema = z
  .object({
    enabled: z.boolean().default(false),
    script: z.string().optional(),
    env: z.record(EnvValueSchema).default({}),
  })
  .passthrough();

export const GitBlockSchema = z
  .object({
    enabled: z.boolean().default(false),
  })
  .passthrough();

export const NotifyBlockSchema = z.object({
  url: z.string().url(),
  events: z.array(z.enum(NOTIFY_EVENTS)).default([...NOTIFY_EVENTS]),
});

export const RoadmapDocumentSchema = z.object({
  name: z.string().min(1).optional(),
  ecosystem: z.string().optional(),
  preamble: TextSchema.optional(),
  git: GitBlockSchema.optional(),
  review: z.boolean().default(false),
  min_coverage: z.number().min(0).max(100).optional(),
  notify: NotifyBlockSchema.optional(),
  deploy: DeployBlockSchema.optional(),
  tasks: z.array(z.unknown()).min(1, "No tasks found in roadmap"),
});

export type RoadmapDocument = z.infer<typeof RoadmapDocumentSchema>;
export type DeployBlock = z.infer<typeof DeployBlockSchema>;
export type NotifyBlock = z.infer<typeof NotifyBlockSchema>;

// =============================================================================
// ISSUE FORMATTING
// =============================================================================

export function formatSchemaIssue(issue: ZodIssue): { field?: string; message: string } {
  const field = issue.path.length > 0 ? issue.path.join(".") : undefined;

  if (issue.code === "invalid_type") {
    return { field, message: `Expected ${issue.expected}, received ${issue.received}` };
  }
  if (issue.code === "invalid_enum_value") {
    const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
    return {
      field,
      message: `Expected one of ${options}, received ${JSON.stringify(issue.received)}`,
    };
  }

  return { field, message: issue.message };
}

export function isKnownAgent(value: string): value is AgentKind {
  return AGENT_KINDS.some((kind) => kind === value);
}

export function isKnownEcosystem(value: string): value is Ecosystem {
  return ECOSYSTEMS.some((ecosystem) => ecosystem === value);
}
