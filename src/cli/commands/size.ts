import type { HarnessConfig } from '../../config/schema.js';
import { estimateSavingsMb, inspectImageSize } from '../../core/size.js';
import type { ArtifactMetadata } from '../../core/types.js';
import { DockerRuntime } from '../../runtime/docker.js';
import { formatImageRef, type ContainerRuntime } from '../../runtime/types.js';
import type { Logger } from '../../utils/logger.js';
import { formatMb, keyValue } from '../ui/format.js';
import { getRenderer } from '../ui/renderer.js';

export interface SizeCommandOptions {
  config: HarnessConfig;
  runtime?: ContainerRuntime;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * `dockcheck size` — run only the size check against an image that already exists.
 */
export async function runSizeCommand(
  opts: SizeCommandOptions,
): Promise<{ ok: boolean; metadata?: ArtifactMetadata; details?: unknown }> {
  const r = getRenderer();
  const { config } = opts;
  const runtime = opts.runtime ?? new DockerRuntime({ bin: config.runtime, logger: opts.logger });
  const image = { name: config.image.name, tag: config.image.tag };

  const inspection = await inspectImageSize(runtime, image, config.size.thresholdMb, opts.signal);
  if (inspection.error) return { ok: false, details: inspection.error };
  if (!inspection.image) {
    return { ok: false, details: `Image ${formatImageRef(image)} not found. Build it first with \`dockcheck verify\`.` };
  }

  const meta = inspection.metadata;
  r.text(keyValue('Image', formatImageRef(image)));
  r.text(keyValue('Size', meta.sizeRaw));
  if (meta.sizeMb !== null) r.text(keyValue('Normalized', `${meta.sizeMb} MB`));
  r.text(keyValue('Created', inspection.image.createdAt));
  r.blank();

  if (meta.sizeClass === 'under_threshold') {
    r.success(`Under the ${config.size.thresholdMb} MB target`);
    const savings = estimateSavingsMb(meta, config.size.referenceMb);
    if (savings !== null) r.dim(`~${formatMb(savings)} smaller than the ${formatMb(config.size.referenceMb)} reference image`);
  } else if (meta.sizeClass === 'over_threshold') {
    r.warn(`Larger than the ${config.size.thresholdMb} MB target`);
  } else {
    r.warn(`Could not interpret size "${meta.sizeRaw}"`);
  }
  return { ok: true, metadata: meta };
}
