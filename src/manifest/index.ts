import { cargoManifest } from "./cargo.js";
import { npmManifest } from "./npm.js";
import type { ManifestKind, ManifestKindId } from "./types.js";

export * from "./types.js";
export { cargoManifest, parseCargoManifest } from "./cargo.js";
export { npmManifest, parseNpmManifest } from "./npm.js";

const KINDS: Record<ManifestKindId, ManifestKind> = {
  cargo: cargoManifest,
  npm: npmManifest,
};

export function getManifestKind(id: ManifestKindId): ManifestKind {
  return KINDS[id];
}

/** Kinds in precedence order, with an optional build tool override per kind. */
export function resolveManifestKinds(
  ids: readonly ManifestKindId[],
  tools: Partial<Record<ManifestKindId, string>> = {}
): ManifestKind[] {
  return ids.map((id) => {
    const base = getManifestKind(id);
    const tool = tools[id];
    return tool ? { ...base, tool } : base;
  });
}
