// Tests for HAL-FORMS rendering

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { HalFormsSerializer, renderTemplates } from './hal-forms-serializer.js';
import { affordance } from '../../models/affordance.js';
import { Link } from '../../models/link.js';
import { EntityModel } from '../../models/representation-model.js';

describe('renderTemplates', () => {
  it('should key the first template as default', () => {
    const templates = renderTemplates([
      affordance('PUT', { title: 'Update', input: z.object({ note: z.string() }) }),
      affordance('DELETE')
    ]);

    expect(templates).toEqual({
      default: {
        method: 'PUT',
        title: 'Update',
        properties: [{ name: 'note', required: true, type: 'text' }]
      },
      delete: { method: 'DELETE', properties: [] }
    });
  });

  it('should suffix duplicate keys with their position', () => {
    const templates = renderTemplates([
      affordance('GET'),
      affordance('POST', { name: 'add' }),
      affordance('PUT', { name: 'add' })
    ]);
    expect(Object.keys(templates)).toEqual(['default', 'add', 'add2']);
  });
});

describe('HalFormsSerializer', () => {
  const serializer = new HalFormsSerializer();

  it('should render the self link affordances after _links', () => {
    const self = Link.of('/orders/1')
      .andAffordance(affordance('PATCH', { name: 'update', contentType: 'application/merge-patch+json' }))
      .andAffordance(affordance('DELETE', { name: 'cancel' }));
    const document = serializer.serialize(EntityModel.of({ id: 1 }, self));

    expect(Object.keys(document)).toEqual(['id', '_links', '_templates']);
    expect(document._templates).toEqual({
      default: { method: 'PATCH', contentType: 'application/merge-patch+json', properties: [] },
      cancel: { method: 'DELETE', properties: [] }
    });
    expect(document._links).toEqual({ self: { href: '/orders/1' } });
  });

  it('should ignore affordances on other links', () => {
    const model = EntityModel.of(
      { id: 1 },
      Link.of('/orders/1'),
      Link.of('/orders/1/items', 'items').andAffordance(affordance('POST'))
    );
    expect(serializer.serialize(model)._templates).toBeUndefined();
  });
});
