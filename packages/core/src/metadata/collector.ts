import os from 'node:os';
import process from 'node:process';

import type { MetadataPrimitive } from './metadata.js';

/**
 * Supplies host/platform metadata for a new Run.
 * The model never inspects the environment itself; it asks a collector.
 */
export interface MetadataCollector {
  collect(): Record<string, MetadataPrimitive>;
}

/**
 * Collector backed by the running Node.js process.
 */
export class NodeMetadataCollector implements MetadataCollector {
  constructor(private readonly now: () => Date = () => new Date()) {}

  collect(): Record<string, MetadataPrimitive> {
    const metadata: Record<string, MetadataPrimitive> = {
      date: this.now().toISOString(),
      platform: `${os.type()}-${os.release()}-${os.arch()}`,
      runtime_name: 'node',
      runtime_version: process.versions.node,
      runtime_executable: process.execPath,
    };

    const hostname = os.hostname().trim();
    if (hostname) metadata.hostname = hostname;

    const cpus = os.cpus();
    if (cpus.length > 0) {
      metadata.cpu_count = cpus.length;
      const model = cpus[0]?.model.trim();
      if (model) metadata.cpu_model_name = model;
    }

    // Always 0 on Windows
    const loadAvg = os.loadavg()[0];
    if (loadAvg !== undefined && loadAvg > 0) {
      metadata.load_avg_1min = Number(loadAvg.toFixed(2));
    }
    return metadata;
  }
}

/**
 * Collector returning a fixed mapping; useful when metadata was gathered
 * elsewhere (another process, a previous session).
 */
export class StaticMetadataCollector implements MetadataCollector {
  constructor(private readonly metadata: Record<string, MetadataPrimitive>) {}

  collect(): Record<string, MetadataPrimitive> {
    return { ...this.metadata };
  }
}
