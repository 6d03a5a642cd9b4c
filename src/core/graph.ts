import { dependencies, deref, type Application, type Ref, type Resource, type Stage } from "./models.js";

/**
 * Orders every resource reachable from the application's roots so that each
 * one comes after all of its dependencies. Shared resources appear once.
 */
export function orderResources<S extends Stage>(app: Application<S>): readonly Resource<S>[] {
  const ordered: Resource<S>[] = [];
  const visited = new Set<number>();

  const visit = (ref: Ref): void => {
    if (visited.has(ref.id)) {
      return;
    }
    visited.add(ref.id);
    const resource = deref(app, ref);
    for (const dependency of dependencies(resource)) {
      visit(dependency);
    }
    ordered.push(resource);
  };

  for (const root of app.roots) {
    visit(root);
  }
  return ordered;
}
