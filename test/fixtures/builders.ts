/**
 * Small builders for in-memory documents used across the tests.
 */

import { ApiDocument, Operation, Schema, SchemaRef } from '../../src/core/types';
import { parseDocumentText } from '../../src/formats';
import { isOpenApiDocument, loadDocument } from '../../src/loader/openapi-loader';

export function inline(schema: Schema): SchemaRef {
  return { value: schema };
}

export function named(name: string, schema: Schema): SchemaRef {
  return { ref: `#/components/schemas/${name}`, value: schema };
}

export function jsonContent(schema: SchemaRef): Operation['responses'] {
  return {
    '200': {
      description: 'OK',
      content: { 'application/json': { schema } },
    },
  };
}

/**
 * A self-referential tree node: Node.children is an array of Node.
 */
export function treeNode(extraProperties: Record<string, SchemaRef> = {}): SchemaRef {
  const node: Schema = { type: 'object', properties: { ...extraProperties } };
  const ref = named('Node', node);
  node.properties = {
    ...node.properties,
    children: inline({ type: 'array', items: ref }),
  };
  return ref;
}

/**
 * Two mutually-referential schemas: Owner.pets → Pet[], Pet.owner → Owner.
 */
export function ownerAndPet(petRequired: string[] = ['name']): { owner: SchemaRef; pet: SchemaRef } {
  const ownerSchema: Schema = { type: 'object' };
  const petSchema: Schema = { type: 'object', required: petRequired };
  const owner = named('Owner', ownerSchema);
  const pet = named('Pet', petSchema);

  ownerSchema.properties = { pets: inline({ type: 'array', items: pet }) };
  petSchema.properties = { name: inline({ type: 'string' }), owner };
  return { owner, pet };
}

export function petstore(petRequired: string[] = ['id', 'name']): ApiDocument {
  const { owner, pet } = ownerAndPet(petRequired);
  return {
    paths: {
      '/pets/{id}': {
        get: {
          operationId: 'getPet',
          parameters: [{ name: 'id', in: 'path', required: true, schema: inline({ type: 'string' }) }],
          responses: jsonContent(pet),
        },
      },
      '/owners/{id}': {
        get: { operationId: 'getOwner', responses: jsonContent(owner) },
      },
    },
  };
}

/**
 * GET /a returning an object with one property, loaded from JSON text so the
 * property name can be anything, '__proto__' included.
 */
export function jsonDocumentWithProperty(name: string, type: string): ApiDocument {
  const text = `{
    "openapi": "3.0.3",
    "info": { "title": "Test", "version": "1.0.0" },
    "paths": {
      "/a": {
        "get": {
          "responses": {
            "200": {
              "description": "OK",
              "content": {
                "application/json": {
                  "schema": { "type": "object", "properties": { "${name}": { "type": "${type}" } } }
                }
              }
            }
          }
        }
      }
    }
  }`;

  const parsed = parseDocumentText(text, 'document.json');
  if (!isOpenApiDocument(parsed)) {
    throw new Error('Not an OpenAPI 3 document');
  }
  return loadDocument(parsed);
}
