import { PermissionError } from "./errors";

export const ALLOWED_TARGETS = ["capcut", "source", "all"] as const;

/**
 * Which category of files a process may mutate:
 * - `capcut`: host-editor project folders only
 * - `source`: original media files only
 * - `all`: both
 */
export type AllowedTargets = (typeof ALLOWED_TARGETS)[number];

export type ModificationTarget = "capcut" | "source";

export interface Capabilities {
  readonly allowedTargets: AllowedTargets;
}

export const createCapabilities = (
  allowedTargets: AllowedTargets
): Capabilities => ({ allowedTargets });

export const canModify = (
  capabilities: Capabilities,
  target: ModificationTarget
): boolean =>
  capabilities.allowedTargets === "all" ||
  capabilities.allowedTargets === target;

export const assertCanModify = (
  capabilities: Capabilities,
  target: ModificationTarget,
  operation: string
): void => {
  if (canModify(capabilities, target)) {
    return;
  }

  const required = target === "capcut" ? "capcut or all" : "source or all";
  throw new PermissionError(
    `${operation} needs permission to modify ${target} files, but allowed targets are "${capabilities.allowedTargets}" (requires ${required})`,
    {
      expected: target,
      actual: capabilities.allowedTargets,
      operation,
    }
  );
};

export interface OperationDescriptor {
  name: string;
  description: string;
  // Undefined for read-only operations
  requires?: ModificationTarget;
}

export const OPERATIONS: readonly OperationDescriptor[] = [
  { name: "projects", description: "List host-editor projects" },
  { name: "open", description: "Show the structure of a project" },
  { name: "transcribe", description: "Transcribe a media file with word timestamps" },
  { name: "analyze", description: "Build a cut plan from a transcript" },
  { name: "subtitles", description: "Write an SRT file for a transcript" },
  {
    name: "smart-cut",
    description: "Remove pauses and duplicate takes from a project",
    requires: "capcut",
  },
  {
    name: "add-subtitles",
    description: "Add a subtitle track to a project",
    requires: "capcut",
  },
];

/** Operations to advertise under the given capabilities. */
export const availableOperations = (
  capabilities: Capabilities
): OperationDescriptor[] =>
  OPERATIONS.filter(
    (operation) =>
      !operation.requires || canModify(capabilities, operation.requires)
  );
