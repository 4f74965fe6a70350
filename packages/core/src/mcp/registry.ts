/**
 * Capability registries
 *
 * Built once from the startup capability set and frozen. There is no way to
 * add or remove an entry afterwards; the dispatcher only ever reads.
 *
 * @internal
 */

import type {
  CapabilitySet,
  TetherPrompt,
  TetherResource,
  TetherResourceTemplate,
  TetherTool,
} from '../types/public-api.js';

/**
 * Read-only, insertion-ordered lookup table
 */
export class CapabilityRegistry<T> {
  private readonly entries: ReadonlyMap<string, T>;

  /**
   * @throws Error when two entries share a key
   */
  constructor(
    readonly kind: string,
    items: readonly T[],
    keyOf: (item: T) => string
  ) {
    const entries = new Map<string, T>();
    for (const item of items) {
      const key = keyOf(item);
      if (entries.has(key)) {
        throw new Error(`${kind} "${key}" is already registered.`);
      }
      Object.freeze(item);
      entries.set(key, item);
    }
    this.entries = entries;
    Object.freeze(this);
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get(key: string): T | undefined {
    return this.entries.get(key);
  }

  /**
   * All entries in registration order
   */
  list(): T[] {
    return [...this.entries.values()];
  }
}

export interface CapabilityRegistries {
  readonly tools: CapabilityRegistry<TetherTool>;
  readonly resources: CapabilityRegistry<TetherResource>;
  readonly resourceTemplates: CapabilityRegistry<TetherResourceTemplate>;
  readonly prompts: CapabilityRegistry<TetherPrompt>;
}

/**
 * Assemble the four registries from a capability set
 *
 * @example
 * ```typescript
 * const registries = createRegistries({ tools: [greetTool], prompts: [reviewPrompt] });
 * registries.tools.get('greet');
 * ```
 */
export function createRegistries(capabilities: CapabilitySet = {}): CapabilityRegistries {
  for (const template of capabilities.resourceTemplates ?? []) {
    compileUriTemplate(template.uriTemplate);
  }

  return Object.freeze({
    tools: new CapabilityRegistry('Tool', capabilities.tools ?? [], tool => tool.name),
    resources: new CapabilityRegistry('Resource', capabilities.resources ?? [], resource => resource.uri),
    resourceTemplates: new CapabilityRegistry(
      'Resource template',
      capabilities.resourceTemplates ?? [],
      template => template.uriTemplate
    ),
    prompts: new CapabilityRegistry('Prompt', capabilities.prompts ?? [], prompt => prompt.name),
  });
}

// ---------------------------------------------------------------------------
// URI templates
// ---------------------------------------------------------------------------

export interface CompiledUriTemplate {
  pattern: RegExp;
  variables: string[];
}

const EXPRESSION = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Compile a level-1 URI template into a matcher
 *
 * `{var}` matches one non-empty path segment (no `/`).
 *
 * @throws Error when a variable name repeats
 */
export function compileUriTemplate(template: string): CompiledUriTemplate {
  const variables: string[] = [];
  let source = '';
  let last = 0;

  for (const match of template.matchAll(EXPRESSION)) {
    const name = match[1] ?? '';
    if (variables.includes(name)) {
      throw new Error(`URI template "${template}" repeats variable "${name}".`);
    }
    variables.push(name);
    source += escapeRegExp(template.slice(last, match.index)) + '([^/]+)';
    last = (match.index ?? 0) + match[0].length;
  }
  source += escapeRegExp(template.slice(last));

  return { pattern: new RegExp(`^${source}$`), variables };
}

/**
 * Match a URI against a template
 *
 * @returns Decoded variables, or null when the URI does not match
 */
export function matchUriTemplate(template: string, uri: string): Record<string, string> | null {
  const { pattern, variables } = compileUriTemplate(template);
  const match = pattern.exec(uri);
  if (!match) {
    return null;
  }

  const values: Record<string, string> = {};
  for (const [index, name] of variables.entries()) {
    const raw = match[index + 1] ?? '';
    try {
      values[name] = decodeURIComponent(raw);
    } catch {
      // Malformed percent-encoding cannot name a resource
      return null;
    }
  }
  return values;
}

/**
 * Find the first template (in registration order) matching a URI
 */
export function findResourceTemplate(
  registry: CapabilityRegistry<TetherResourceTemplate>,
  uri: string
): { template: TetherResourceTemplate; variables: Record<string, string> } | undefined {
  for (const template of registry.list()) {
    const variables = matchUriTemplate(template.uriTemplate, uri);
    if (variables) {
      return { template, variables };
    }
  }
  return undefined;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
