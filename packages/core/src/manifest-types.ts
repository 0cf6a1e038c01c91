/**
 * Component manifest types.
 *
 * A Manifest is the validated, frozen description of one installable
 * component version. Known fields are typed; anything else found at the
 * top level of the manifest document is preserved in `extra`.
 */

export const COMPONENT_TYPES = ["agent", "tool", "prompt_template"] as const;

export type ComponentType = (typeof COMPONENT_TYPES)[number];

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue };

/**
 * A dependency on another component, constrained by a version range
 * (`^1.2.0`, `>=1.0.0 <2.0.0`, `==1.4.2`, ...).
 */
export interface ManifestDependency {
  readonly name: string;
  readonly versionConstraint: string;
}

/**
 * A file copied from the bundle (`src`) into the target tree (`dest`).
 * Both are relative, forward-slash paths.
 */
export interface ManifestFile {
  readonly src: string;
  readonly dest: string;
}

export interface Manifest {
  /** Unique component id */
  readonly name: string;
  readonly componentType: ComponentType;
  /** Semantic version: MAJOR.MINOR.PATCH[-pre] */
  readonly version: string;
  readonly description: string;
  readonly author?: string;
  /** Distinct tags, in declaration order */
  readonly tags: readonly string[];
  readonly dependencies: readonly ManifestDependency[];
  /** Minimum host language/runtime version the component's sources require */
  readonly minLanguageVersion?: string;
  readonly files: readonly ManifestFile[];
  /** Distinct variable names the files may reference as `{{name}}` */
  readonly templateVariables: readonly string[];
  /** Default values for declared template variables */
  readonly templateDefaults: Readonly<Record<string, string>>;
  /** Environment variables the installed component reads (advisory) */
  readonly environmentVariables: readonly string[];
  /** Free text shown after installation (advisory only) */
  readonly postInstallMessage?: string;
  /** Unknown top-level fields, preserved for forward compatibility */
  readonly extra: Readonly<Record<string, JsonValue>>;
}

/** `name@version` identifier of a resolved component. */
export function componentId(manifest: Pick<Manifest, "name" | "version">): string {
  return `${manifest.name}@${manifest.version}`;
}
