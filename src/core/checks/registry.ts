import { PluginResolutionError } from '../errors.js';
import type { CheckRule, FieldValue } from '../rules/schema.js';

/** A named external checker referenced by a rule's `plugin` key. */
export interface FieldPlugin {
  check(value: FieldValue, rule: CheckRule): boolean;
}

function isFieldPlugin(candidate: unknown): candidate is FieldPlugin {
  return (
    typeof candidate === 'object' &&
    candidate !== null &&
    'check' in candidate &&
    typeof candidate.check === 'function'
  );
}

/**
 * Registry of plugin checkers, keyed by the name used in rule files.
 * Populated before validation; unknown names are rejected, never loaded.
 */
export class CheckerRegistry {
  private readonly plugins = new Map<string, FieldPlugin>();

  /**
   * Register a plugin. Throws `PluginResolutionError` on duplicate names
   * or when the value has no `check` entry point.
   */
  register(name: string, plugin: unknown): this {
    if (this.plugins.has(name)) {
      throw new PluginResolutionError(name, 'a plugin with this name is already registered');
    }
    if (!isFieldPlugin(plugin)) {
      throw new PluginResolutionError(name, 'plugin does not expose a check function');
    }
    this.plugins.set(name, plugin);
    return this;
  }

  has(name: string): boolean {
    return this.plugins.has(name);
  }

  names(): string[] {
    return [...this.plugins.keys()];
  }

  /** Look up a plugin, throwing `PluginResolutionError` if it is not registered. */
  resolve(name: string): FieldPlugin {
    const plugin = this.plugins.get(name);
    if (plugin === undefined) {
      throw new PluginResolutionError(name, 'no plugin registered under this name');
    }
    return plugin;
  }

  /** Copy of this registry, so per-validator registrations do not leak. */
  clone(): CheckerRegistry {
    const copy = new CheckerRegistry();
    for (const [name, plugin] of this.plugins) {
      copy.register(name, plugin);
    }
    return copy;
  }
}
