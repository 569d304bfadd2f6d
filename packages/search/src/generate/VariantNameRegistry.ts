/**
 * VariantNameRegistry
 *
 * Assigns stable names to concrete model configurations so that
 * value-equal configurations reached from different coordinates share
 * one name (and one measurement).
 *
 * Names are `<model>_config_<N>`, N counting up from 0 per model, with
 * `<model>_config_default` reserved for the default configuration.
 */

import { NamingCollisionError } from '../errors.js';

export type VariantPayload = Record<string, unknown>;

export interface VariantNameResolution {
  name: string;
  isNew: boolean;
}

interface ModelVariants {
  nameByKey: Map<string, string>;
  keyByName: Map<string, string>;
  nextIndex: number;
}

/**
 * Serialize with sorted keys at every depth
 */
function canonicalize(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalize(item)).join(',')}]`;
  }

  if (typeof value === 'object' && value !== null) {
    const entries = Object.entries(value)
      .filter(([, item]) => item !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, item]) => `${JSON.stringify(key)}:${canonicalize(item)}`);
    return `{${entries.join(',')}}`;
  }

  return JSON.stringify(value) ?? 'null';
}

/**
 * Canonical key for a payload, ignoring its name field
 */
export function canonicalPayloadKey(payload: VariantPayload): string {
  const { name: _name, ...rest } = payload;
  return canonicalize(rest);
}

export function defaultVariantName(modelName: string): string {
  return `${modelName}_config_default`;
}

export class VariantNameRegistry {
  private readonly models = new Map<string, ModelVariants>();

  /**
   * Name for a payload, assigning a new one if the payload is unseen
   */
  nameFor(modelName: string, payload: VariantPayload, isDefault: boolean = false): string {
    return this.resolve(modelName, payload, isDefault).name;
  }

  /**
   * Check-then-insert runs synchronously, so callers interleaved on the
   * event loop cannot split one payload across two names.
   */
  resolve(modelName: string, payload: VariantPayload, isDefault: boolean = false): VariantNameResolution {
    if (isDefault) {
      return { name: defaultVariantName(modelName), isNew: false };
    }

    const variants = this.variantsFor(modelName);
    const key = canonicalPayloadKey(payload);

    const existing = variants.nameByKey.get(key);
    if (existing !== undefined) {
      return { name: existing, isNew: false };
    }

    const name = `${modelName}_config_${variants.nextIndex}`;
    const owner = variants.keyByName.get(name);
    if (owner !== undefined && owner !== key) {
      throw new NamingCollisionError(name, { modelName });
    }

    variants.nextIndex++;
    variants.nameByKey.set(key, name);
    variants.keyByName.set(name, key);

    return { name, isNew: true };
  }

  /**
   * Number of non-default variants assigned for a model
   */
  variantCount(modelName: string): number {
    return this.models.get(modelName)?.nameByKey.size ?? 0;
  }

  reset(): void {
    this.models.clear();
  }

  private variantsFor(modelName: string): ModelVariants {
    let variants = this.models.get(modelName);
    if (variants === undefined) {
      variants = { nameByKey: new Map(), keyByName: new Map(), nextIndex: 0 };
      this.models.set(modelName, variants);
    }
    return variants;
  }
}
