import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ValidationError } from "../errors.js";
import { parseJsonOrThrow, parseOrThrow, RawTaskListSchema, ShedParamsSchema, type ShedParams } from "../schemas.js";
import type { RawTask, Task } from "./types.js";

/** Display order for per-phase breakdowns. Phases not listed here sort last. */
export const PHASE_ORDER = [
  "planning",
  "permitting",
  "demolition",
  "foundation",
  "framing",
  "rough_in",
  "inspection",
  "finishing",
  "final_inspection",
] as const;

export const SHED_TEMPLATE = "shed_construction";

const TemplateFileSchema = z.record(
  z.object({
    description: z.string(),
    tasks: RawTaskListSchema,
  }),
);

type TemplateFile = z.infer<typeof TemplateFileSchema>;

const TEMPLATES_PATH = fileURLToPath(new URL("../../templates/projects.json", import.meta.url));

let loaded: TemplateFile | undefined;

function fixedTemplates(): TemplateFile {
  loaded ??= parseJsonOrThrow(TemplateFileSchema, readFileSync(TEMPLATES_PATH, "utf8"), "template file");
  return loaded;
}

export type TemplateInfo = {
  name: string;
  description: string;
  /** For the shed, the count with default parameters. */
  taskCount: number;
};

export function listTemplates(): TemplateInfo[] {
  const fixed = Object.entries(fixedTemplates()).map(([name, t]) => ({
    name,
    description: t.description,
    taskCount: t.tasks.length,
  }));
  return [
    ...fixed,
    { name: SHED_TEMPLATE, description: "Storage shed (parametric)", taskCount: shedTasks({}).length },
  ];
}

/**
 * Raw task list for a named project type. `params` is only read by the shed
 * template. Each call returns fresh objects.
 */
export function projectTasks(projectType: string, params?: Record<string, unknown>): RawTask[] {
  if (projectType === SHED_TEMPLATE) {
    return shedTasks(parseOrThrow(ShedParamsSchema, params ?? {}, "shed parameters"));
  }
  const template = fixedTemplates()[projectType];
  if (!template) {
    const known = listTemplates().map((t) => t.name).join(", ");
    throw new ValidationError("UNKNOWN_TEMPLATE", `Unknown project type "${projectType}" (known: ${known})`);
  }
  return structuredClone(template.tasks);
}

/** Storage shed tasks. Foundation and electrical work are optional. */
export function shedTasks(params: ShedParams): RawTask[] {
  const hasFoundation = params.hasFoundation ?? true;
  const hasElectrical = params.hasElectrical ?? false;
  const width = params.dimensions?.width ?? 10;
  const length = params.dimensions?.length ?? 12;
  const height = params.dimensions?.height ?? 8;

  const tasks: RawTask[] = [];
  const add = (task: Omit<RawTask, "id">): string => {
    const id = String(tasks.length + 1);
    tasks.push({ id, ...task });
    return id;
  };

  const design = add({
    owner: "Architect",
    description: `Design shed plans (${width}x${length} ft)`,
    phase: "planning",
    dependencies: [],
    requirements: { width, length, height },
    materials: ["blueprints", "specifications"],
  });

  const base = hasFoundation
    ? add({
        owner: "Mason",
        description: "Pour concrete foundation slab",
        phase: "foundation",
        dependencies: [design],
        requirements: { area: width * length },
        materials: ["concrete", "rebar", "gravel"],
      })
    : design;

  const framing = add({
    owner: "Carpenter",
    description: "Frame walls and install door/window openings",
    phase: "framing",
    dependencies: [base],
    requirements: { wallCount: 4, doorCount: 1, windowCount: 1 },
    materials: ["2x4 lumber", "plywood", "nails", "door frame", "window frame"],
  });

  const trusses = add({
    owner: "Carpenter",
    description: "Build and install roof trusses",
    phase: "framing",
    dependencies: [framing],
    requirements: { span: width },
    materials: ["2x4 lumber", "truss plates", "plywood sheathing"],
  });

  const roofing = add({
    owner: "Roofer",
    description: "Install roofing (shingles and underlayment)",
    phase: "rough_in",
    dependencies: [trusses],
    requirements: { area: width * length * 1.3 },
    materials: ["asphalt shingles", "roofing felt", "drip edge", "nails"],
  });

  const sidingDeps = [roofing];
  if (hasElectrical) {
    sidingDeps.push(
      add({
        owner: "Electrician",
        description: "Install electrical wiring, outlet, and light fixture",
        phase: "rough_in",
        dependencies: [framing],
        requirements: { outlets: 1, lights: 1 },
        materials: ["electrical wire", "outlet", "light fixture", "breaker"],
      }),
    );
  }

  const siding = add({
    owner: "Carpenter",
    description: "Install exterior siding",
    phase: "finishing",
    dependencies: sidingDeps,
    requirements: { area: (width + length) * 2 * height },
    materials: ["siding panels", "trim", "corner boards", "nails"],
  });

  const openings = add({
    owner: "Carpenter",
    description: "Install door and window",
    phase: "finishing",
    dependencies: [siding],
    requirements: { doorCount: 1, windowCount: 1 },
    materials: ["entry door", "window", "hinges", "hardware"],
  });

  const paint = add({
    owner: "Painter",
    description: "Paint exterior finish",
    phase: "finishing",
    dependencies: [openings],
    requirements: { coats: 2 },
    materials: ["exterior paint", "primer", "brushes", "rollers"],
  });

  add({
    owner: "Carpenter",
    description: "Final walkthrough and cleanup",
    phase: "final_inspection",
    dependencies: [paint],
    requirements: { checklist: ["doors close properly", "roof is sealed", "paint is dry"] },
    materials: [],
  });

  return tasks;
}

export type PhaseGroup = {
  phase: string;
  tasks: Array<Readonly<Task>>;
};

export type TaskBreakdown = {
  byPhase: PhaseGroup[];
  byOwner: Record<string, number>;
};

/** Group tasks by phase (in PHASE_ORDER) and count them per owner. */
export function taskBreakdown(tasks: ReadonlyArray<Readonly<Task>>): TaskBreakdown {
  const groups = new Map<string, PhaseGroup>();
  const byOwner: Record<string, number> = {};

  for (const task of tasks) {
    const group = groups.get(task.phase) ?? { phase: task.phase, tasks: [] };
    group.tasks.push(task);
    groups.set(task.phase, group);
    byOwner[task.owner] = (byOwner[task.owner] ?? 0) + 1;
  }

  const rank = (phase: string): number => {
    const i = PHASE_ORDER.findIndex((p) => p === phase);
    return i === -1 ? PHASE_ORDER.length : i;
  };
  // Array.prototype.sort is stable, so unknown phases keep first-seen order.
  const byPhase = [...groups.values()].sort((a, b) => rank(a.phase) - rank(b.phase));

  return { byPhase, byOwner };
}
