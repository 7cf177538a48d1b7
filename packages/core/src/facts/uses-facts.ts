import { isComponent, isContainer, isSoftwareSystem } from '../model/element-kinds.js';
import { InvalidArgumentError } from '../errors.js';
import { UsesFactListSchema } from '../schemas/uses-facts.schema.js';
import { validate } from '../utils/validation.js';
import type { Container } from '../model/container.js';
import type { Element } from '../model/element.js';
import type { Relationship } from '../model/relationship.js';
import type { SoftwareSystem } from '../model/software-system.js';
import type { StaticStructureElement } from '../model/static-structure-element.js';
import type { UsesFact, UsesFactInput } from '../schemas/uses-facts.schema.js';

export interface UsesFactsResult {
  created: Relationship[];
  /** Facts describing a relationship the model already had. */
  skipped: UsesFact[];
  /** Facts whose destination could not be found. */
  unresolved: UsesFact[];
  /** Facts the model refused, such as a relationship between a parent and its child. */
  rejected: RejectedUsesFact[];
}

export interface RejectedUsesFact {
  fact: UsesFact;
  error: InvalidArgumentError;
}

type Resolver<T extends StaticStructureElement> = (fact: UsesFact) => T | null;

function owningSoftwareSystem(element: Element): SoftwareSystem | null {
  if (isSoftwareSystem(element)) return element;
  if (isContainer(element)) return element.getSoftwareSystem();
  if (isComponent(element)) return element.getContainer().getSoftwareSystem();
  return null;
}

function applyFacts<T extends StaticStructureElement>(
  source: StaticStructureElement,
  facts: readonly UsesFactInput[],
  resolve: Resolver<T>
): UsesFactsResult {
  const parsed = validate(UsesFactListSchema, facts, 'uses facts');
  const result: UsesFactsResult = { created: [], skipped: [], unresolved: [], rejected: [] };

  for (const fact of parsed) {
    const destination = resolve(fact);
    if (!destination) {
      result.unresolved.push(fact);
      continue;
    }
    let relationship: Relationship | null;
    try {
      relationship = source.uses(
        destination,
        fact.description,
        fact.technology,
        fact.interactionStyle
      );
    } catch (error) {
      if (!(error instanceof InvalidArgumentError)) throw error;
      result.rejected.push({ fact, error });
      continue;
    }
    if (relationship) {
      result.created.push(relationship);
    } else {
      result.skipped.push(fact);
    }
  }

  return result;
}

/**
 * Turn "uses container" facts into relationships from `source`.
 *
 * A destination is matched by element id, then by canonical name, then by
 * container name within the source's own software system.
 */
export function applyUsesContainers(
  source: StaticStructureElement,
  facts: readonly UsesFactInput[]
): UsesFactsResult {
  const model = source.getModel();
  const softwareSystem = owningSoftwareSystem(source);

  return applyFacts<Container>(source, facts, (fact) => {
    const byId = model.getElement(fact.destination);
    if (isContainer(byId)) return byId;
    const byCanonicalName = model.getElementWithCanonicalName(fact.destination);
    if (isContainer(byCanonicalName)) return byCanonicalName;
    return softwareSystem?.getContainerWithName(fact.destination) ?? null;
  });
}

/**
 * Turn "uses software system" facts into relationships from `source`.
 *
 * A destination is matched by element id, then by canonical name, then by name.
 */
export function applyUsesSoftwareSystems(
  source: StaticStructureElement,
  facts: readonly UsesFactInput[]
): UsesFactsResult {
  const model = source.getModel();

  return applyFacts<SoftwareSystem>(source, facts, (fact) => {
    const byId = model.getElement(fact.destination);
    if (isSoftwareSystem(byId)) return byId;
    const byCanonicalName = model.getElementWithCanonicalName(fact.destination);
    if (isSoftwareSystem(byCanonicalName)) return byCanonicalName;
    return model.getSoftwareSystemWithName(fact.destination);
  });
}
