/**
 * Plugin/Extension Architecture
 *
 * Plugins extend the dispatcher through the Manager contract and observe it
 * through lifecycle events.
 */

export {
  definePlugin,
  PluginManager,
  type HandlerOptions,
  type InterceptorOptions,
  type Manager,
  type Plugin,
  type RouteOptions,
} from './plugin.ts';
export {
  EventEmitter,
  Events,
  type DispatchEvents,
  type EventHandler,
  type EventMap,
} from './events.ts';
