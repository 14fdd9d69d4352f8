/**
 * Property-based tests for value normalization, operators and templates
 */

import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import * as fc from 'fast-check';
import { normalizeValue, splitPathList } from '../../src/environment/normalizer';
import { applyOperator, classifyKey } from '../../src/environment/file-merger';
import { expandTemplate, findTemplateReferences } from '../../src/environment/expander';

const MIN_RUNS = 100;

const SEPARATORS = [':', ';'];
const separator = fc.constantFrom(...SEPARATORS);
const segment = fc.stringMatching(/^[A-Za-z0-9_./-]{1,12}$/);
const variableName = fc.stringMatching(/^[A-Z][A-Z0-9_]{0,8}$/).map((name) => `V_${name}`);

describe('Value operators (Property-based)', () => {
  describe('List normalization', () => {
    it('should join lists with the separator and split back to the same segments', () => {
      fc.assert(
        fc.property(fc.array(segment, { maxLength: 10 }), separator, (items, sep) => {
          const joined = normalizeValue(items, sep);

          assert.equal(joined, items.join(sep));
          assert.deepEqual(splitPathList(joined, sep), items);
        }),
        { numRuns: MIN_RUNS }
      );
    });

    it('should stringify scalars', () => {
      fc.assert(
        fc.property(fc.oneof(fc.integer(), fc.boolean(), segment), separator, (value, sep) => {
          assert.equal(normalizeValue(value, sep), String(value));
        }),
        { numRuns: MIN_RUNS }
      );
    });
  });

  describe('Operators', () => {
    it('should append after and prepend before a non-empty current value', () => {
      fc.assert(
        fc.property(variableName, segment, segment, separator, (name, current, value, sep) => {
          const appended = new Map([[name, current]]);
          applyOperator(appended, name, 'append', value, sep);
          assert.equal(appended.get(name), `${current}${sep}${value}`);

          const prepended = new Map([[name, current]]);
          applyOperator(prepended, name, 'prepend', value, sep);
          assert.equal(prepended.get(name), `${value}${sep}${current}`);
        }),
        { numRuns: MIN_RUNS }
      );
    });

    it('should set the value alone when the current value is missing or empty', () => {
      fc.assert(
        fc.property(
          variableName,
          fc.constantFrom('append' as const, 'prepend' as const, 'replace' as const),
          segment,
          fc.boolean(),
          (name, operator, value, presentButEmpty) => {
            const env = new Map<string, string>(presentButEmpty ? [[name, '']] : []);
            applyOperator(env, name, operator, value, ':');
            assert.equal(env.get(name), value);
          }
        ),
        { numRuns: MIN_RUNS }
      );
    });

    it('should strip exactly one operator prefix from a key', () => {
      fc.assert(
        fc.property(variableName, fc.constantFrom('', '+=', '^='), (name, prefix) => {
          const classified = classifyKey(`${prefix}${name}`);
          assert.equal(classified.name, name);
          assert.equal(classified.operator, prefix === '+=' ? 'append' : prefix === '^=' ? 'prepend' : 'replace');
        }),
        { numRuns: MIN_RUNS }
      );
    });
  });

  describe('Templates', () => {
    it('should expand unresolved references to the empty string', () => {
      fc.assert(
        fc.property(segment, variableName, segment, (before, name, after) => {
          assert.equal(expandTemplate(`${before}{$${name}}${after}`, new Map()), `${before}${after}`);
        }),
        { numRuns: MIN_RUNS }
      );
    });

    it('should substitute every reference from the current mapping', () => {
      fc.assert(
        fc.property(fc.array(fc.tuple(variableName, segment), { minLength: 1, maxLength: 5 }), (pairs) => {
          const current = new Map(pairs);
          const template = pairs.map(([name]) => `{$${name}}`).join('/');
          const expected = pairs.map(([name]) => current.get(name) ?? '').join('/');

          assert.equal(expandTemplate(template, current), expected);
          assert.deepEqual(findTemplateReferences(template), pairs.map(([name]) => name));
        }),
        { numRuns: MIN_RUNS }
      );
    });

    it('should leave text without tokens unchanged', () => {
      fc.assert(
        fc.property(fc.string().filter((value) => !value.includes('{$')), (value) => {
          assert.equal(expandTemplate(value, new Map([['A', 'x']])), value);
        }),
        { numRuns: MIN_RUNS }
      );
    });
  });
});
