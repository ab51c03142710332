/**
 * Route Matcher
 *
 * Selects a route for a method and path. Templates are grouped by method and
 * tried in registration order; the first structural match wins, so when two
 * templates overlap (e.g. `/users/:id` and `/users/me`) the one registered
 * first is selected.
 */

import type { HttpMethod } from '../http/types.ts';
import { matchTemplate, splitPath, type RouteTemplate } from './template.ts';

/**
 * Anything the matcher can select
 */
export interface MatchableRoute {
  readonly method: HttpMethod;
  readonly template: RouteTemplate;
}

export interface RouteMatch<T extends MatchableRoute> {
  route: T;
  params: Record<string, string>;
}

/**
 * Method-grouped route matcher
 */
export class Matcher<T extends MatchableRoute> {
  private routesByMethod = new Map<string, T[]>();

  /**
   * Add a route at the end of its method group
   */
  add(route: T): this {
    const group = this.routesByMethod.get(route.method);
    if (group) {
      group.push(route);
    } else {
      this.routesByMethod.set(route.method, [route]);
    }
    return this;
  }

  /**
   * Match a method and path to a route
   */
  match(method: string, path: string): RouteMatch<T> | null {
    const routes = this.routesByMethod.get(method.toUpperCase());
    if (!routes) {
      return null;
    }

    const segments = splitPath(path);
    for (const route of routes) {
      const params = matchTemplate(route.template, segments);
      if (params) {
        return { route, params };
      }
    }

    return null;
  }

  /**
   * Methods that have a template matching the path
   */
  allowedMethods(path: string): HttpMethod[] {
    const segments = splitPath(path);
    const allowed: HttpMethod[] = [];

    for (const routes of this.routesByMethod.values()) {
      const found = routes.find((route) => matchTemplate(route.template, segments) !== null);
      if (found) {
        allowed.push(found.method);
      }
    }

    return allowed;
  }

  /**
   * All routes, by method then registration order
   */
  getRoutes(): T[] {
    return [...this.routesByMethod.values()].flat();
  }

  clear(): void {
    this.routesByMethod.clear();
  }
}
