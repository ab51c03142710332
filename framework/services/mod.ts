/**
 * Service Location
 */

export {
  isServiceToken,
  ServiceKey,
  ServiceRegistry,
  type ServiceClass,
  type ServiceFactory,
  type ServiceLocator,
  type ServiceModule,
  type ServiceToken,
} from './locator.ts';
