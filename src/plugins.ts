/**
 * Plugin utilities.
 *
 * Domain modules of the host contribute endpoints through plugins. Plugins
 * run during server construction, before the socket is opened.
 */
import type { Reactor } from './reactor.ts';
import type { EndpointHandler, Host } from './types.ts';

/**
 * What a plugin can reach during setup.
 */
export interface PluginContext {
  host: Host;
  reactor: Reactor;
  registerEndpoint(path: string, handler: EndpointHandler): void;
}

/**
 * Plugin definition.
 */
export interface ApiPlugin {
  name: string;
  /** Static endpoints, registered before `setup` runs. */
  endpoints?: Record<string, EndpointHandler>;
  /** Called once during server construction. */
  setup?: (context: PluginContext) => void;
}

/**
 * Register every plugin's endpoints, then run its setup hook.
 *
 * Endpoint collisions are reported with the plugin that caused them.
 */
export function installPlugins(plugins: readonly ApiPlugin[], context: PluginContext): void {
  const names = new Set<string>();
  for (const plugin of plugins) {
    if (names.has(plugin.name)) {
      throw new Error(`Duplicate plugin name: ${plugin.name}`);
    }
    names.add(plugin.name);

    for (const [path, handler] of Object.entries(plugin.endpoints ?? {})) {
      try {
        context.registerEndpoint(path, handler);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new Error(`${message} (from plugin ${plugin.name})`, { cause: err });
      }
    }

    plugin.setup?.(context);
  }
}

/**
 * Identity helper for typed plugin definitions.
 */
export function definePlugin(plugin: ApiPlugin): ApiPlugin {
  return plugin;
}
