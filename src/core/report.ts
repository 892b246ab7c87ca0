import type { ImageLayer, ImageRecord, ResourceSample } from '../runtime/types.js';
import { buildServiceUrl } from './health.js';
import type { ArtifactMetadata, BuildResult, HealthProbe, InstanceHandle, ManagementCommand, VerifyReport } from './types.js';

/** Same keys, values masked. Container env carries pass-through credentials. */
export function redactEnv(env: Record<string, string>): Record<string, string> {
  return Object.fromEntries(Object.keys(env).map((key) => [key, '***']));
}

export function managementCommands(name: string, bin: string = 'docker'): ManagementCommand[] {
  return [
    { label: 'Follow logs', command: `${bin} logs -f ${name}` },
    { label: 'Stop', command: `${bin} stop ${name}` },
    { label: 'Remove', command: `${bin} rm ${name}` },
    { label: 'Live stats', command: `${bin} stats ${name}` },
    { label: 'Tear down', command: `${bin} stop ${name} && ${bin} rm ${name}` },
  ];
}

export function buildReport(input: {
  build: BuildResult;
  artifact: ArtifactMetadata;
  image: ImageRecord | null;
  layers: ImageLayer[];
  instance: InstanceHandle;
  containerId: string;
  host: string;
  docsPath: string;
  health: HealthProbe;
  resources: ResourceSample | null;
  runtimeBin?: string;
}): VerifyReport {
  return {
    build: input.build,
    artifact: input.artifact,
    image: input.image,
    layers: input.layers,
    instance: input.instance,
    containerId: input.containerId,
    serviceUrl: buildServiceUrl(input.host, input.instance.hostPort, '/').replace(/\/$/, ''),
    docsUrl: buildServiceUrl(input.host, input.instance.hostPort, input.docsPath),
    health: input.health,
    resources: input.resources,
    commands: managementCommands(input.instance.name, input.runtimeBin),
  };
}
