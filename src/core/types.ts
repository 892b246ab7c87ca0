import type { ImageLayer, ImageRecord, ImageRef, ResourceSample } from '../runtime/types.js';

export interface BuildResult {
  readonly imageName: string;
  readonly tag: string;
  readonly durationSeconds: number;
  readonly succeeded: boolean;
}

export type SizeClass = 'under_threshold' | 'over_threshold' | 'unknown';

export interface ArtifactMetadata {
  sizeRaw: string;
  /** Megabyte-equivalent; null when the size string could not be parsed. */
  sizeMb: number | null;
  sizeClass: SizeClass;
}

export interface InstanceHandle {
  name: string;
  image: ImageRef;
  hostPort: number;
  containerPort: number;
  env: Record<string, string>;
}

export interface HealthProbe {
  attempt: number;
  responseBody?: string;
  matched: boolean;
  /** Decoded `status` field when matched. */
  status?: string;
  /** Why the attempt did not match. */
  error?: string;
}

export interface VerifyReport {
  build: BuildResult;
  artifact: ArtifactMetadata;
  image: ImageRecord | null;
  layers: ImageLayer[];
  instance: InstanceHandle;
  containerId: string;
  serviceUrl: string;
  docsUrl: string;
  health: HealthProbe;
  resources: ResourceSample | null;
  commands: ManagementCommand[];
}

export interface ManagementCommand {
  label: string;
  command: string;
}
