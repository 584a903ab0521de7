import * as path from "path";
import { TYPE_PRIORITY } from "./classifier";
import { formatSubject } from "./message";
import {
  AggregateClassification,
  ChangedFile,
  CommitMessage,
  PipelineConfig,
  PromptTemplate,
} from "./types";

export type FallbackSettings = Pick<PipelineConfig, "maxSubjectLength" | "forceScope">;

/**
 * Longest directory prefix shared by every path ("" when none)
 */
export function commonDirectory(paths: readonly string[]): string {
  if (paths.length === 0) return "";
  const dirs = paths.map((p) => {
    const dir = path.posix.dirname(p);
    return dir === "." ? [] : dir.split("/");
  });
  const common: string[] = [];
  for (let i = 0; i < dirs[0].length; i++) {
    const segment = dirs[0][i];
    if (dirs.every((d) => d[i] === segment)) {
      common.push(segment);
    } else {
      break;
    }
  }
  return common.join("/");
}

const MAX_SCOPE_LENGTH = 20;
// A space, one character of the target and the ellipsis
const MIN_TARGET_ROOM = 3;

/**
 * Scope token for a directory name: lowercase, no spaces or parentheses
 */
export function toScope(name: string): string {
  const scope = name
    .toLowerCase()
    .replace(/[^\w.-]+/g, "-")
    .slice(0, MAX_SCOPE_LENGTH)
    .replace(/^-+|-+$/g, "");
  return scope || "root";
}

function chooseVerb(files: readonly ChangedFile[]): string {
  if (files.length > 0 && files.every((f) => f.status === "added")) return "add";
  if (files.length > 0 && files.every((f) => f.status === "deleted")) return "remove";
  if (files.length > 0 && files.every((f) => f.status === "renamed")) return "rename";
  return "update";
}

/**
 * Descriptions from most to least specific
 */
function describeTargets(files: readonly ChangedFile[]): string[] {
  if (files.length === 1) {
    const file = files[0];
    const base = path.posix.basename(file.path);
    return file.path === base ? [base] : [file.path, base];
  }
  const dir = commonDirectory(files.map((f) => f.path));
  const count = `${files.length} files`;
  return dir ? [`${count} in ${dir}/`, count] : [count];
}

/**
 * Builds a valid conventional message from the classification alone
 */
export class FallbackComposer {
  constructor(private readonly settings: FallbackSettings) {}

  compose(aggregate: AggregateClassification, template: PromptTemplate): CommitMessage {
    const files = aggregate.files;
    let scope: string | undefined;
    if (this.settings.forceScope) {
      const dir = commonDirectory(files.map((f) => f.path));
      scope = dir ? toScope(path.posix.basename(dir)) : "root";
    }

    const verb = chooseVerb(files);
    let base: CommitMessage = {
      type: aggregate.type,
      scope,
      bang: aggregate.breaking,
      description: verb,
      body: [],
    };
    let available = this.settings.maxSubjectLength - formatSubject(base).length;
    if (available < MIN_TARGET_ROOM && scope !== undefined && scope !== "root") {
      base = { ...base, scope: "root" };
      available = this.settings.maxSubjectLength - formatSubject(base).length;
    }
    const targets = describeTargets(files);
    const target = targets.find((t) => t.length + 1 <= available);

    let description: string;
    if (target) {
      description = `${verb} ${target}`;
    } else {
      const last = targets[targets.length - 1];
      const room = Math.max(available - 2, 1);
      description = `${verb} ${last.slice(0, room)}…`;
    }

    const body =
      template === "comprehensive"
        ? TYPE_PRIORITY.map((type) => {
            const paths = aggregate.perFile
              .filter((c) => c.type === type)
              .flatMap((c) => c.files.map((f) => f.path));
            return paths.length > 0 ? `${type}: ${paths.join(", ")}` : "";
          }).filter((line) => line.length > 0)
        : [];

    let footer: string | undefined;
    if (aggregate.breaking) {
      const breakingPaths = aggregate.perFile
        .filter((c) => c.breaking)
        .flatMap((c) => c.files.map((f) => f.path));
      footer = `incompatible changes in ${breakingPaths.join(", ")}`;
    }

    return { ...base, description, body, footer };
  }
}
