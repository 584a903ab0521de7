import * as path from "path";
import { ChangeClassifier } from "./classifier";
import { ChangedFile, ChangeType } from "./types";

export interface ChangeGroup {
  number: number;
  directory: string;
  type: ChangeType;
  files: ChangedFile[];
}

/**
 * Split a changeset into related groups keyed by directory and file type.
 * Groups keep the order in which their first file appears.
 */
export function groupChanges(
  files: readonly ChangedFile[],
  classifier: ChangeClassifier
): ChangeGroup[] {
  const groups = new Map<string, ChangeGroup>();

  for (const file of files) {
    const { type } = classifier.classifyFile(file);
    const directory = path.posix.dirname(file.path);
    const key = `${directory}\u0000${type}`;
    let group = groups.get(key);
    if (!group) {
      group = { number: groups.size + 1, directory, type, files: [] };
      groups.set(key, group);
    }
    group.files.push(file);
  }

  return Array.from(groups.values());
}

export function describeGroup(group: ChangeGroup): string {
  const where = group.directory === "." ? "repository root" : `${group.directory}/`;
  return `${group.type} changes in ${where}`;
}
