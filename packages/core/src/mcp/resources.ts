/**
 * MCP resources handlers (resources/list, resources/templates/list, resources/read)
 * @internal
 */

import type { ResourceContent } from '../types/public-api.js';
import type {
  JsonRpcParams,
  ResourcesListResult,
  ResourcesReadResult,
  ResourceTemplatesListResult,
} from './types.js';
import { findResourceTemplate, type CapabilityRegistries } from './registry.js';
import type { InvokeHandler } from './invocation.js';
import { resourceNotFound } from './errors.js';
import { listParamsSchema, parseParams, resourcesReadParamsSchema } from './params.js';

/**
 * Handle resources/list request
 *
 * Only fixed-URI resources are listed; templates have their own method.
 */
export function handleResourcesList(
  params: JsonRpcParams | undefined,
  registries: CapabilityRegistries
): ResourcesListResult {
  parseParams(listParamsSchema, params);

  return {
    resources: registries.resources.list().map(resource => ({
      uri: resource.uri,
      name: resource.name,
      description: resource.description,
      mimeType: resource.mimeType,
    })),
  };
}

export function handleResourceTemplatesList(
  params: JsonRpcParams | undefined,
  registries: CapabilityRegistries
): ResourceTemplatesListResult {
  parseParams(listParamsSchema, params);

  return {
    resourceTemplates: registries.resourceTemplates.list().map(template => ({
      uriTemplate: template.uriTemplate,
      name: template.name,
      description: template.description,
      mimeType: template.mimeType,
    })),
  };
}

/**
 * Handle resources/read request
 *
 * An exact URI match wins; otherwise templates are tried in registration
 * order and the first match serves the read.
 */
export async function handleResourcesRead(
  params: JsonRpcParams | undefined,
  registries: CapabilityRegistries,
  invoke: InvokeHandler
): Promise<ResourcesReadResult> {
  const { uri } = parseParams(resourcesReadParamsSchema, params);

  let content: ResourceContent;
  const resource = registries.resources.get(uri);
  if (resource) {
    content = await invoke(`resource:${resource.uri}`, ctx => resource.handler(ctx));
  } else {
    const match = findResourceTemplate(registries.resourceTemplates, uri);
    if (!match) {
      throw resourceNotFound(uri);
    }
    const { template, variables } = match;
    content = await invoke(`resource:${template.uriTemplate}`, ctx =>
      template.handler(uri, variables, ctx)
    );
  }

  return {
    contents: [
      {
        uri: content.uri,
        mimeType: content.mimeType,
        text: content.text,
        blob: content.blob,
      },
    ],
  };
}
