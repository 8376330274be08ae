/**
 * HAL-FORMS Serializer
 *
 * HAL plus `_templates`: the affordances of a resource's self link
 * rendered as forms. The first affordance is the `default` template.
 */

import type { Affordance, AffordanceProperty } from '../../models/affordance.js';
import { IanaLinkRelations } from '../../models/link-relation.js';
import type { RepresentationModel } from '../../models/representation-model.js';
import type { HttpMethod } from '../../models/types.js';
import { HalSerializer, type HalDocument } from './hal-serializer.js';

export const DEFAULT_TEMPLATE = 'default';

/**
 * A rendered HAL-FORMS template
 */
export interface HalFormsTemplate {
  method: HttpMethod;
  title?: string;
  contentType?: string;
  properties: AffordanceProperty[];
}

function toTemplate(affordance: Affordance): HalFormsTemplate {
  const template: HalFormsTemplate = {
    method: affordance.method,
    properties: affordance.properties.map(property => ({ ...property }))
  };
  if (affordance.title !== undefined) template.title = affordance.title;
  if (affordance.contentType !== undefined) template.contentType = affordance.contentType;
  return template;
}

/**
 * Keys templates: the first is `default`, the rest use their name
 * (or method), suffixed when a key is already taken
 */
export function renderTemplates(affordances: readonly Affordance[]): Record<string, HalFormsTemplate> {
  const templates: Record<string, HalFormsTemplate> = {};

  affordances.forEach((affordance, index) => {
    let key = index === 0 ? DEFAULT_TEMPLATE : affordance.name ?? affordance.method.toLowerCase();
    if (Object.hasOwn(templates, key)) {
      key = `${key}${index}`;
    }
    templates[key] = toTemplate(affordance);
  });

  return templates;
}

/**
 * HAL-FORMS Serializer Implementation
 */
export class HalFormsSerializer extends HalSerializer {
  override serialize(model: RepresentationModel): HalDocument {
    const document = super.serialize(model);
    const self = model.getLink(IanaLinkRelations.SELF);

    if (self && self.affordances.length > 0) {
      document._templates = renderTemplates(self.affordances);
    }

    return document;
  }
}
