/**
 * Tests for the recursive schema diff
 */

import { resolveConfig } from '../src/core/config';
import { diffSchemas, isSchemaDiffEmpty } from '../src/core/schema-diff';
import { DiffState } from '../src/core/state';
import { inline, named, ownerAndPet, treeNode } from './fixtures/builders';

const config = resolveConfig();

describe('Schema diff', () => {
  // ─── Slots ────────────────────────────────────────────────────────────

  describe('Slots', () => {
    test('two absent slots produce no diff', () => {
      expect(diffSchemas(config, new DiffState(), undefined, undefined)).toEqual({});
    });

    test('reports an added slot', () => {
      expect(diffSchemas(config, new DiffState(), undefined, inline({ type: 'string' }))).toEqual({
        schemaAdded: true,
      });
    });

    test('reports a deleted slot', () => {
      expect(diffSchemas(config, new DiffState(), inline({ type: 'string' }), undefined)).toEqual({
        schemaDeleted: true,
      });
    });

    test('identical schemas produce an empty diff', () => {
      const schema = { type: 'object', required: ['id'], properties: { id: inline({ type: 'integer' }) } };
      const diff = diffSchemas(config, new DiffState(), inline(schema), inline({ ...schema }));

      expect(diff).toEqual({});
      expect(isSchemaDiffEmpty(diff)).toBe(true);
    });
  });

  // ─── Fields ───────────────────────────────────────────────────────────

  describe('Fields', () => {
    test('reports changed scalar fields', () => {
      const diff = diffSchemas(
        config,
        new DiffState(),
        inline({ type: 'string', format: 'date', description: 'Birthday' }),
        inline({ type: 'string', format: 'date-time', description: 'Birth time' })
      );

      expect(diff).toEqual({
        formatDiff: { from: 'date', to: 'date-time' },
        descriptionDiff: { from: 'Birthday', to: 'Birth time' },
      });
    });

    test('ignores descriptions when configured', () => {
      const diff = diffSchemas(
        resolveConfig({ excludeDescription: true }),
        new DiffState(),
        inline({ type: 'string', description: 'old' }),
        inline({ type: 'string', description: 'new' })
      );

      expect(diff).toEqual({});
    });

    test('ignores examples when configured but still diffs defaults', () => {
      const diff = diffSchemas(
        resolveConfig({ excludeExamples: true }),
        new DiffState(),
        inline({ type: 'integer', example: 1, default: 10 }),
        inline({ type: 'integer', example: 2, default: 20 })
      );

      expect(diff).toEqual({ defaultDiff: { from: 10, to: 20 } });
    });

    test('reports required names as a set diff', () => {
      const diff = diffSchemas(
        config,
        new DiffState(),
        inline({ type: 'object', required: ['id', 'name'] }),
        inline({ type: 'object', required: ['tag', 'id'] })
      );

      expect(diff).toEqual({ requiredDiff: { added: ['tag'], deleted: ['name'] } });
    });

    test('reports enum members by their encoded values', () => {
      const diff = diffSchemas(
        config,
        new DiffState(),
        inline({ type: 'string', enum: ['available', 'sold'] }),
        inline({ type: 'string', enum: ['available', 'pending'] })
      );

      expect(diff).toEqual({ enumDiff: { added: ['"pending"'], deleted: ['"sold"'] } });
    });

    test('reports reordered enum members', () => {
      const diff = diffSchemas(
        config,
        new DiffState(),
        inline({ enum: [1, 2, 3] }),
        inline({ enum: [3, 2, 1] })
      );

      expect(diff).toEqual({ enumDiff: { reordered: true } });
    });

    test('reports changed constraints', () => {
      const diff = diffSchemas(
        config,
        new DiffState(),
        inline({ type: 'integer', minimum: 1, maximum: 100 }),
        inline({ type: 'integer', minimum: 1, maximum: 200, exclusiveMaximum: true })
      );

      expect(diff).toEqual({
        maximumDiff: { from: 100, to: 200 },
        exclusiveMaximumDiff: { from: undefined, to: true },
      });
    });
  });

  // ─── Nested Schemas ───────────────────────────────────────────────────

  describe('Nested schemas', () => {
    test('reports added, deleted and modified properties', () => {
      const diff = diffSchemas(
        config,
        new DiffState(),
        inline({
          type: 'object',
          properties: { id: inline({ type: 'integer' }), nickname: inline({ type: 'string' }) },
        }),
        inline({
          type: 'object',
          properties: { id: inline({ type: 'string' }), tag: inline({ type: 'string' }) },
        })
      );

      expect(diff).toEqual({
        propertiesDiff: {
          added: ['tag'],
          deleted: ['nickname'],
          modified: { id: { typeDiff: { from: 'integer', to: 'string' } } },
        },
      });
    });

    test('recurses into array items', () => {
      const diff = diffSchemas(
        config,
        new DiffState(),
        inline({ type: 'array', items: inline({ type: 'string', maxLength: 10 }) }),
        inline({ type: 'array', items: inline({ type: 'string', maxLength: 20 }) })
      );

      expect(diff).toEqual({ itemsDiff: { maxLengthDiff: { from: 10, to: 20 } } });
    });

    test('reports items added to a schema', () => {
      const diff = diffSchemas(
        config,
        new DiffState(),
        inline({ type: 'array' }),
        inline({ type: 'array', items: inline({ type: 'string' }) })
      );

      expect(diff).toEqual({ itemsDiff: { schemaAdded: true } });
    });

    test('treats additionalProperties true and absent alike', () => {
      const diff = diffSchemas(
        config,
        new DiffState(),
        inline({ type: 'object', additionalProperties: true }),
        inline({ type: 'object' })
      );

      expect(diff).toEqual({});
    });

    test('reports additionalProperties being disallowed', () => {
      const diff = diffSchemas(
        config,
        new DiffState(),
        inline({ type: 'object' }),
        inline({ type: 'object', additionalProperties: false })
      );

      expect(diff).toEqual({ additionalPropertiesAllowedDiff: { from: true, to: false } });
    });

    test('recurses into an additionalProperties schema', () => {
      const diff = diffSchemas(
        config,
        new DiffState(),
        inline({ type: 'object', additionalProperties: inline({ type: 'string' }) }),
        inline({ type: 'object', additionalProperties: inline({ type: 'integer' }) })
      );

      expect(diff).toEqual({ additionalPropertiesDiff: { typeDiff: { from: 'string', to: 'integer' } } });
    });

    test('diffs composition lists', () => {
      const diff = diffSchemas(
        config,
        new DiffState(),
        inline({ oneOf: [inline({ type: 'string' }), inline({ type: 'integer' })] }),
        inline({ oneOf: [inline({ type: 'string' }), inline({ type: 'number' })] })
      );

      expect(diff).toEqual({
        oneOfDiff: { modified: { '#1': { typeDiff: { from: 'integer', to: 'number' } } } },
      });
    });

    test('diffs a reference against an inline schema by content', () => {
      const diff = diffSchemas(
        config,
        new DiffState(),
        named('Id', { type: 'string' }),
        inline({ type: 'integer' })
      );

      expect(diff).toEqual({ typeDiff: { from: 'string', to: 'integer' } });
    });
  });

  // ─── Cycles ───────────────────────────────────────────────────────────

  describe('Cycles', () => {
    test('terminates on a self-referential schema compared with itself', () => {
      const node = treeNode();
      const state = new DiffState();

      expect(diffSchemas(config, state, node, node)).toEqual({});
      expect(state.isActive(node.value, node.value)).toBe(false);
    });

    test('terminates on two separately built self-referential schemas', () => {
      const state = new DiffState();
      const before = treeNode({ label: inline({ type: 'string' }) });
      const after = treeNode({ label: inline({ type: 'integer' }) });

      expect(diffSchemas(config, state, before, after)).toEqual({
        propertiesDiff: { modified: { label: { typeDiff: { from: 'string', to: 'integer' } } } },
      });
      expect(state.isActive(before.value, after.value)).toBe(false);
    });

    test('reports a change inside mutually recursive schemas once', () => {
      const state = new DiffState();
      const before = ownerAndPet(['name']);
      const after = ownerAndPet([]);
      const diff = diffSchemas(config, state, before.owner, after.owner);

      expect(diff).toEqual({
        propertiesDiff: {
          modified: {
            pets: { itemsDiff: { requiredDiff: { deleted: ['name'] } } },
          },
        },
      });
      expect(state.isActive(before.owner.value, after.owner.value)).toBe(false);
      expect(state.isActive(before.pet.value, after.pet.value)).toBe(false);
    });

    test('the guard holds a pair only while it is open', () => {
      const state = new DiffState();
      const a = { type: 'object' };
      const b = { type: 'object' };

      state.push(a, b);
      expect(state.isActive(a, b)).toBe(true);
      expect(state.isActive(b, a)).toBe(false);
      state.pop(a, b);
      expect(state.isActive(a, b)).toBe(false);
    });

    test('diffs a reference used twice at sibling locations both times', () => {
      const before = named('Address', { type: 'object', required: ['city'] });
      const after = named('Address', { type: 'object' });

      const diff = diffSchemas(
        config,
        new DiffState(),
        inline({ type: 'object', properties: { home: before, work: before } }),
        inline({ type: 'object', properties: { home: after, work: after } })
      );

      expect(diff).toEqual({
        propertiesDiff: {
          modified: {
            home: { requiredDiff: { deleted: ['city'] } },
            work: { requiredDiff: { deleted: ['city'] } },
          },
        },
      });
    });
  });
});
