export const PACKAGE_NAME = "@armory/test-utils" as const;

export {
  type BundleContents,
  InMemoryRegistryClient,
  type RegistryCall,
} from "./in-memory-registry.js";
export { createManifest, type ManifestInit } from "./manifest-builder.js";
