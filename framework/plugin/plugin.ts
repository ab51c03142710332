/**
 * Plugin System
 *
 * Plugins register handlers, providers and processors through the Manager
 * contract. They are installed in dependency order while the application is
 * set up, before the registry is sealed.
 */

import { ConfigurationError } from '../errors.ts';
import type { BodyType, HttpMethod } from '../http/types.ts';
import type {
  Annotation,
  Handler,
  HandlerKind,
  ParameterProvider,
  ParameterSpec,
  PathPattern,
  ResponseProcessor,
} from '../registry/entries.ts';
import type { Logger } from '../telemetry/logger.ts';

export interface HandlerOptions {
  name?: string;
  params?: ParameterSpec[];
  annotations?: Annotation[];
}

export interface RouteOptions extends HandlerOptions {
  /** Accepted request body types */
  bodyTypes?: BodyType[];
  /** Status written with the handler's value (default 200) */
  statusCode?: number;
  contentType?: string;
}

export interface InterceptorOptions extends HandlerOptions {
  /** Ordering key; lower runs earlier (default 0) */
  group?: number;
}

/**
 * Registration contract shared by the application and plugins
 */
export interface Manager {
  addRoute(method: HttpMethod, path: string, handler: Handler, options?: RouteOptions): void;
  addInterceptor(pattern: PathPattern, handler: Handler, options?: InterceptorOptions): void;
  addErrorHandler(
    statusCode: number | 'default',
    handler: Handler,
    options?: HandlerOptions
  ): void;
  addParameterProvider(
    marker: string,
    provider: ParameterProvider,
    kinds?: readonly HandlerKind[]
  ): void;
  addResponseProcessor(processor: ResponseProcessor, marker?: string): void;
}

export interface Plugin {
  name: string;
  version?: string;
  description?: string;
  dependencies?: string[];
  install: (manager: Manager) => void | Promise<void>;
}

/**
 * Plugin manager
 */
export class PluginManager {
  private plugins = new Map<string, Plugin>();
  private installedPlugins = new Set<string>();

  constructor(private logger?: Logger) {}

  /**
   * Register a plugin
   */
  register(plugin: Plugin): this {
    if (this.plugins.has(plugin.name)) {
      throw new ConfigurationError(`Plugin already registered: ${plugin.name}`);
    }

    this.plugins.set(plugin.name, plugin);
    return this;
  }

  /**
   * Install a plugin after its dependencies
   */
  async install(pluginName: string, manager: Manager, installing: string[] = []): Promise<void> {
    if (this.installedPlugins.has(pluginName)) return;

    const plugin = this.plugins.get(pluginName);
    if (!plugin) {
      const requiredBy = installing[installing.length - 1];
      throw new ConfigurationError(
        requiredBy
          ? `Plugin not found: ${pluginName} (required by ${requiredBy})`
          : `Plugin not found: ${pluginName}`
      );
    }

    if (installing.includes(pluginName)) {
      throw new ConfigurationError(
        `Circular plugin dependency: ${[...installing, pluginName].join(' -> ')}`
      );
    }

    for (const dep of plugin.dependencies ?? []) {
      await this.install(dep, manager, [...installing, pluginName]);
    }

    this.logger?.debug(`Installing plugin: ${plugin.name}${plugin.version ? `@${plugin.version}` : ''}`);
    await plugin.install(manager);
    this.installedPlugins.add(pluginName);
  }

  /**
   * Install every registered plugin, in registration order subject to
   * dependencies
   */
  async installAll(manager: Manager): Promise<void> {
    for (const pluginName of this.plugins.keys()) {
      await this.install(pluginName, manager);
    }
  }

  isInstalled(pluginName: string): boolean {
    return this.installedPlugins.has(pluginName);
  }

  getPlugins(): Plugin[] {
    return Array.from(this.plugins.values());
  }

  getInstalledPlugins(): string[] {
    return Array.from(this.installedPlugins);
  }

  /**
   * Forget installations so the next setup installs everything again
   */
  reset(): void {
    this.installedPlugins.clear();
  }
}

/**
 * Define a plugin
 */
export function definePlugin(plugin: Plugin): Plugin {
  return plugin;
}
