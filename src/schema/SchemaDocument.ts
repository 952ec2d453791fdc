/**
 * SchemaDocument: structure of a vocabulary schema document.
 *
 * A document is a mapping from type name to type declaration:
 *
 * ```yaml
 * Note:
 *   uri: https://www.w3.org/ns/activitystreams#Note
 *   extends: [Object]
 *   properties:
 *     content:
 *       LangContainer:
 *         type: string
 *         container_tag: contentMap
 *         uri: https://www.w3.org/ns/activitystreams#content
 * ```
 */

import { z } from 'zod';
import { SchemaError } from '../core/errors.js';
import type { PreferredName, PropertyDef, TypeDef } from './types.js';

const propertyKindSchema = z.enum(['Required', 'Functional', 'Normal']);

const simpleBodySchema = z.object({
  type: z.string().min(1),
  tag: z.string().min(1).optional(),
  aka: z.array(z.string().min(1)).default([]),
  uri: z.string(),
  doc: z.string().optional(),
  kind: propertyKindSchema.default('Normal'),
});

const langContainerBodySchema = simpleBodySchema.extend({
  container_tag: z.string().min(1),
  container_aka: z.array(z.string().min(1)).default([]),
});

const propertyDefSchema = z.union([
  z.object({ Simple: simpleBodySchema }).strict(),
  z.object({ LangContainer: langContainerBodySchema }).strict(),
]);

const preferredNameSchema = z.union([
  z.object({ Simple: z.string().min(1) }).strict(),
  z.object({
    LangContainer: z.object({
      default: z.string().min(1),
      container: z.string().min(1),
    }).strict(),
  }).strict(),
]);

const typeDefSchema = z.object({
  uri: z.string(),
  doc: z.string().optional(),
  extends: z.array(z.string().min(1)).default([]),
  properties: z.record(propertyDefSchema).default({}),
  except_properties: z.array(z.string()).default([]),
  preferred_property_name: z.record(preferredNameSchema).default({}),
});

export const schemaDocumentSchema = z.record(typeDefSchema);

export type SchemaDocument = z.infer<typeof schemaDocumentSchema>;
type PropertyDefInput = z.infer<typeof propertyDefSchema>;
type PreferredNameInput = z.infer<typeof preferredNameSchema>;

function toPropertyDef(input: PropertyDefInput): PropertyDef {
  if ('Simple' in input) {
    const { type, tag, aka, uri, doc, kind } = input.Simple;
    return { shape: 'Simple', valueType: type, tag, aliases: aka, uri, doc, kind };
  }
  const { type, tag, aka, uri, doc, kind, container_tag, container_aka } = input.LangContainer;
  return {
    shape: 'LangContainer',
    valueType: type,
    tag,
    aliases: aka,
    uri,
    doc,
    kind,
    containerTag: container_tag,
    containerAliases: container_aka,
  };
}

function toPreferredName(input: PreferredNameInput): PreferredName {
  if ('Simple' in input) {
    return { shape: 'Simple', tag: input.Simple };
  }
  return { shape: 'LangContainer', tag: input.LangContainer.default, containerTag: input.LangContainer.container };
}

/**
 * Validate a parsed schema document and convert it into type definitions,
 * in document order.
 *
 * @param parsed - Result of parsing the document text
 * @param source - Where the document came from, for error messages
 * @throws SchemaError (InvalidDocument) when the structure is wrong
 */
export function readSchemaDocument(parsed: unknown, source: string): TypeDef[] {
  const result = schemaDocumentSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const [issue] = result.error.issues;
    throw SchemaError.invalidDocument(source, issue?.path ?? [], issue?.message ?? result.error.message);
  }

  return Object.entries(result.data).map(([name, def]) => ({
    name,
    uri: def.uri,
    doc: def.doc,
    extends: def.extends,
    properties: new Map(Object.entries(def.properties).map(([key, value]) => [key, toPropertyDef(value)])),
    exceptProperties: def.except_properties,
    preferredPropertyName: new Map(
      Object.entries(def.preferred_property_name).map(([key, value]) => [key, toPreferredName(value)]),
    ),
    source,
  }));
}
