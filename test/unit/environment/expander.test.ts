/**
 * Variable expander unit tests
 */

import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import { expandTemplate, findTemplateReferences } from '../../../src/environment/expander';
import { SpecialVariables } from '../../../src/models/environment';

const SPECIAL: SpecialVariables = {
  __FILE__: '/bundles/tools/envoy_env/dev.json',
  __BUNDLE__: '/bundles/tools',
  __BUNDLE_ENV__: '/bundles/tools/envoy_env',
  __BUNDLE_NAME__: 'tools',
};

describe('expandTemplate()', () => {
  it('should replace references from the mapping built so far', () => {
    const current = new Map([['ROOT', '/opt/app']]);
    assert.equal(expandTemplate('{$ROOT}/bin:{$ROOT}/lib', current), '/opt/app/bin:/opt/app/lib');
  });

  it('should expand unresolved references to the empty string', () => {
    assert.equal(expandTemplate('{$MISSING}/bin', new Map()), '/bin');
  });

  it('should prefer special variables over the mapping', () => {
    const current = new Map([['__BUNDLE__', '/shadowed']]);
    assert.equal(expandTemplate('{$__BUNDLE__}/bin', current, SPECIAL), '/bundles/tools/bin');
    assert.equal(expandTemplate('{$__BUNDLE_NAME__}-{$__BUNDLE_ENV__}', current, SPECIAL), 'tools-/bundles/tools/envoy_env');
  });

  it('should leave text that is not a reference untouched', () => {
    const current = new Map([['A', 'x']]);
    assert.equal(expandTemplate('$A {$ A} {$1A} {A} ${A}', current), '$A {$ A} {$1A} {A} ${A}');
  });

  it('should not resolve names inherited from Object.prototype', () => {
    assert.equal(expandTemplate('[{$constructor}][{$toString}]', new Map(), SPECIAL), '[][]');
  });

  it('should give the same result on repeated calls', () => {
    const current = new Map([['A', '1']]);
    assert.equal(expandTemplate('{$A}{$A}', current), '11');
    assert.equal(expandTemplate('{$A}{$A}', current), '11');
  });
});

describe('findTemplateReferences()', () => {
  it('should list referenced names in order of appearance', () => {
    assert.deepEqual(findTemplateReferences('{$A}-{$_b1}-{$A}-{$9}'), ['A', '_b1', 'A']);
    assert.deepEqual(findTemplateReferences('plain'), []);
  });
});
