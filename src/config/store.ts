import { glob } from 'glob';
import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { parse, stringify } from 'yaml';
import { ZodError, type ZodType, type ZodTypeDef } from 'zod';
import {
  FeatureConfigSchema,
  SfConfigSchema,
  type FeatureConfig,
  type SfConfig,
  type StateExport,
} from './schema.js';
import { resolveStateRoot, statePaths, type StatePaths } from './paths.js';
import { ValidationError } from '../errors.js';
import { logger } from '../utils/logger.js';

function formatZodError(err: ZodError): string {
  return err.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export function parseWith<Out, In>(schema: ZodType<Out, ZodTypeDef, In>, value: unknown, source: string): Out {
  try {
    return schema.parse(value);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new ValidationError(`Invalid ${source}: ${formatZodError(err)}`);
    }
    throw err;
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Reads and writes the persisted state: `config.yml` for hosts, repos, llm
 * templates and settings, one `features/<name>.yml` per feature.
 *
 * Single writer: the store does no locking of its own.
 */
export class StateStore {
  readonly paths: StatePaths;

  constructor(root: string = resolveStateRoot()) {
    this.paths = statePaths(root);
  }

  async ensureDirs(): Promise<void> {
    await mkdir(this.paths.featuresDir, { recursive: true });
    await mkdir(this.paths.locksDir, { recursive: true });
    await mkdir(this.paths.logsDir, { recursive: true });
  }

  private async readYaml(path: string): Promise<unknown | undefined> {
    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) {
        return undefined;
      }
      throw err;
    }

    try {
      return parse(raw) ?? {};
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ValidationError(`Invalid YAML in ${path}: ${message}`);
    }
  }

  async loadConfig(): Promise<SfConfig> {
    const raw = await this.readYaml(this.paths.configFile);
    return parseWith(SfConfigSchema, raw ?? {}, `config file ${this.paths.configFile}`);
  }

  async saveConfig(config: SfConfig): Promise<void> {
    const validated = parseWith(SfConfigSchema, config, 'config');
    await mkdir(this.paths.root, { recursive: true });
    await writeFile(this.paths.configFile, stringify(validated));
    logger.debug('Saved config', { path: this.paths.configFile });
  }

  featurePath(name: string): string {
    return join(this.paths.featuresDir, `${name}.yml`);
  }

  async findFeature(name: string): Promise<FeatureConfig | null> {
    const path = this.featurePath(name);
    const raw = await this.readYaml(path);
    if (raw === undefined) {
      return null;
    }
    return parseWith(FeatureConfigSchema, raw, `feature file ${path}`);
  }

  async loadFeature(name: string): Promise<FeatureConfig> {
    const feature = await this.findFeature(name);
    if (!feature) {
      throw new ValidationError(`Feature '${name}' does not exist`);
    }
    return feature;
  }

  async saveFeature(feature: FeatureConfig): Promise<void> {
    const validated = parseWith(FeatureConfigSchema, feature, `feature '${feature.name}'`);
    await mkdir(this.paths.featuresDir, { recursive: true });
    await writeFile(this.featurePath(validated.name), stringify(validated));
    logger.debug('Saved feature', { feature: validated.name });
  }

  async deleteFeature(name: string): Promise<void> {
    await rm(this.featurePath(name), { force: true });
  }

  async listFeatures(): Promise<string[]> {
    const files = await glob('*.yml', { cwd: this.paths.featuresDir });
    return files.map((file) => file.slice(0, -'.yml'.length)).sort();
  }

  async loadAllFeatures(): Promise<Record<string, FeatureConfig>> {
    const features: Record<string, FeatureConfig> = {};
    for (const name of await this.listFeatures()) {
      features[name] = await this.loadFeature(name);
    }
    return features;
  }

  /**
   * Snapshot of the whole state as one interchange document.
   */
  async dumpState(): Promise<StateExport> {
    return {
      version: 1,
      exportedAt: new Date().toISOString(),
      config: await this.loadConfig(),
      features: await this.loadAllFeatures(),
    };
  }

  async exportState(path: string): Promise<StateExport> {
    const snapshot = await this.dumpState();
    await writeFile(path, JSON.stringify(snapshot, null, 2) + '\n');
    logger.info('Exported state', { path, features: Object.keys(snapshot.features).length });
    return snapshot;
  }

  /**
   * Write a complete, already validated state. With `replace`, feature files
   * not present in `state` are removed.
   */
  async writeState(state: Pick<StateExport, 'config' | 'features'>, replace: boolean): Promise<void> {
    if (replace) {
      for (const name of await this.listFeatures()) {
        if (!Object.hasOwn(state.features, name)) {
          await this.deleteFeature(name);
        }
      }
    }
    await this.saveConfig(state.config);
    for (const feature of Object.values(state.features)) {
      await this.saveFeature(feature);
    }
  }
}
