import { describe, it, expect } from 'vitest';
import { InteractionStyle } from '../interaction-style.js';
import { Workspace } from '../workspace.js';

describe('Relationship', () => {
  function setup() {
    const model = new Workspace('Test').model;
    const customer = model.addPerson('Customer', 'A customer');
    const shop = model.addSoftwareSystem('Shop', 'Online shop');
    return { model, customer, shop };
  }

  it('should expose source and destination ids', () => {
    const { customer, shop } = setup();
    const relationship = customer.uses(shop, 'Places orders', 'HTTPS');

    expect(relationship?.id).toBe('3');
    expect(relationship?.getSourceId()).toBe(customer.id);
    expect(relationship?.getDestinationId()).toBe(shop.id);
  });

  it('should carry the tag of its interaction style', () => {
    const { customer, shop } = setup();
    const relationship = customer.uses(shop, 'Places orders');

    expect(relationship?.getTags()).toEqual(['Relationship', 'Synchronous']);

    if (relationship) {
      relationship.interactionStyle = InteractionStyle.Asynchronous;
    }
    expect(relationship?.getTags()).toEqual(['Relationship', 'Asynchronous']);
  });

  it('should keep required tags when they are removed', () => {
    const { customer, shop } = setup();
    const relationship = customer.uses(shop, 'Places orders');

    relationship?.addTags('Important');
    relationship?.removeTag('Relationship');

    expect(relationship?.getTagsAsString()).toBe('Relationship,Synchronous,Important');
  });

  it('should describe itself using canonical names', () => {
    const { customer, shop } = setup();
    const relationship = customer.uses(shop, 'Places orders');

    expect(relationship?.toString()).toBe('/Customer ---[Places orders]---> /Shop');
  });

  it('should be visible from both ends', () => {
    const { customer, shop } = setup();
    const relationship = customer.uses(shop, 'Places orders');

    expect(customer.getEfferentRelationships()).toEqual([relationship]);
    expect(shop.getAfferentRelationships()).toEqual([relationship]);
    expect(shop.getEfferentRelationships()).toEqual([]);
    expect(customer.hasEfferentRelationshipWith(shop)).toBe(true);
    expect(customer.hasEfferentRelationshipWith(shop, 'Browses')).toBe(false);
  });
});
