// ---------------------------------------------------------------------------
// Shared build domain types.
//
// Definition types describe a manifest as written by the build author;
// resolved types are what the graph, planner and executor work with.
// ---------------------------------------------------------------------------

// -- Building blocks --------------------------------------------------------

/** Lowercase hex SHA-256 digest identifying a step's cache entry. */
export type Fingerprint = string

/** One declared dependency of a step, relative to the build context root. */
export type InputPattern = {
  /** Gitignore-style pattern (`src/`, `requirements.txt`, `**\/*.py`, `!src/tests/`). */
  pattern: string;
  /** When true, matching nothing is not an error. */
  optional: boolean;
}

/** Ordered patterns a step depends on. Later `!` patterns re-exclude. */
export type InputSet = readonly InputPattern[]

/** File additions, changes and removals produced by one step. */
export type FilesystemDelta = {
  added: string[];
  modified: string[];
  removed: string[];
}

// -- Resolved types ---------------------------------------------------------

/**
 * A validated build step.
 * `outputs` undefined means the step's effects are undeclared: it is opaque
 * and cannot be reordered relative to any other step.
 */
export type Step = {
  readonly id: string;
  /** Human-readable display name. Falls back to `id` when absent. */
  readonly name?: string;
  readonly command: string;
  readonly env: Readonly<Record<string, string>>;
  readonly inputs: InputSet;
  /** Image-relative paths the command writes. */
  readonly outputs?: readonly string[];
  /** Step ids this step must run after. */
  readonly after: readonly string[];
  /** Position the step was declared at. */
  readonly orderHint: number;
}

/** A manifest whose steps have been validated. */
export type BuildManifest = {
  name: string;
  /** Label of the base the image starts from; folded into the first fingerprint. */
  base?: string;
  /** Absolute path of the build context. */
  contextRoot: string;
  steps: Step[];
}

/** A step placed in the plan, with its resolved cache key. */
export type PlannedStep = {
  step: Step;
  position: number;
  fingerprint: Fingerprint;
  /** Fingerprint of the previous planned step, or the base digest. */
  predecessor: Fingerprint;
  /** Digest of the step's own files, command and env, without the predecessor. */
  inputDigest: Fingerprint;
  /** Context-relative files matched by the step's inputs, sorted. */
  inputFiles: string[];
  /** Historical miss rate used for ordering, when known. */
  missRate?: number;
}

/** Totally ordered steps of one build invocation. */
export type BuildPlan = {
  manifestName: string;
  contextRoot: string;
  baseDigest: Fingerprint;
  steps: PlannedStep[];
}

/** One applied layer of a committed image. */
export type ImageLayer = {
  stepId: string;
  fingerprint: Fingerprint;
  cached: boolean;
}

/** Final committed filesystem and its ordered layers. */
export type Image = {
  id: string;
  manifestName: string;
  createdAt: string;
  /** Absolute path of the committed root filesystem. */
  rootfs: string;
  layers: ImageLayer[];
}

// -- Definition types -------------------------------------------------------

/** An input as written in a manifest: bare pattern or explicit object. */
export type InputDefinition = string | {pattern: string; optional?: boolean}

/** A step as written in the manifest. `id` is derived from `name` when missing. */
export type StepDefinition = {
  id?: string;
  name?: string;
  run: string;
  env?: Record<string, string>;
  inputs?: InputDefinition[];
  outputs?: string[];
  after?: string[];
}

/** A manifest as written in YAML or JSON. */
export type ManifestDefinition = {
  name?: string;
  base?: string;
  /** Build context directory, relative to the manifest file. */
  context?: string;
  env?: Record<string, string>;
  steps: StepDefinition[];
}
