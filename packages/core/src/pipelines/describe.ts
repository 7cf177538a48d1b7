import { isContainerInstance } from '../model/element-kinds.js';
import type { Element } from '../model/element.js';

/**
 * Human-readable name for any element. A container instance has no name of
 * its own, so it borrows its container's, suffixed with the instance number.
 */
export function displayNameOf(element: Element): string {
  if (isContainerInstance(element)) {
    const container = element.getContainer();
    const base = container?.getName() ?? element.getContainerId();
    return `${base}[${String(element.instanceId)}]`;
  }
  return element.getName() ?? element.id;
}
