export type ActionErrorCode = "not_found" | "build_error" | "not_installed" | "missing_argument" | "remove_error";

export type ArtifactKind = "launchScript" | "payloadScript" | "icon";

export type ArtifactOrigin = "override" | "default";

export interface ActionDefinition {
  id: string;
  displayName: string;
  definitionDir: string;
  launchScript?: string;
  payloadScript?: string;
  icon?: string;
  installHook?: string;
  uninstallHook?: string;
}

export interface DefaultDefinition {
  definitionDir: string;
  launchScript: string;
  payloadScript: string;
  icon: string;
}

export interface ResolvedSource {
  path: string;
  origin: ArtifactOrigin;
}

export type ResolvedSources = Record<ArtifactKind, ResolvedSource>;

export interface ActionListEntry {
  id: string;
  displayName: string;
  installed: boolean;
}

export type ActionFailure = { ok: false; code: ActionErrorCode; error: string };

export type LifecycleState =
  | "idle"
  | "resolving"
  | "building"
  | "installed"
  | "uninstalling"
  | "removed"
  | "failed"
  | "declined";
