import test from 'node:test';
import assert from 'node:assert/strict';
import { classifyChange, classifyRecord } from '../src/core/manifest';
import { changeDirection, floorSeverity } from '../src/core/manifest/severity';
import type { Classification, DependencySpec } from '../src/core/manifest';
import { pathDep, registry, workspaceDep } from './helpers';

const PAIRS: Array<[string, string, Classification]> = [
  ['1.0.217', '1.0.219', 'patch'],
  ['4.5.23', '4.5.30', 'patch'],
  ['1.2', '1.3', 'minor'],
  ['1.40', '1.39', 'minor'],
  ['1', '2', 'major'],
  ['0.3', '0.4', 'major'],
  ['0.3.1', '0.3.2', 'minor'],
  ['0.0.1', '0.0.2', 'major'],
  ['1.2.3-alpha.1', '1.2.3-alpha.2', 'pre-release'],
  ['1.2.3-rc.1', '1.2.3', 'pre-release'],
  ['1.2', '~1.2', 'patch'],
  ['>=1.2, <2', '1.2', 'patch'],
  ['<2', '*', 'patch'],
  ['not-a-version', '1.0.0', 'non-semver'],
  ['1.0.0', 'latest', 'non-semver'],
];

test('registry changes are classified by the move of their floor', () => {
  for (const [a, b, expected] of PAIRS) {
    assert.equal(classifyChange(registry(a), registry(b)), expected, `${a} -> ${b}`);
  }
});

test('magnitude does not depend on direction', () => {
  for (const [a, b, expected] of PAIRS) {
    assert.equal(classifyChange(registry(b), registry(a)), expected, `${b} -> ${a}`);
  }
});

test('any non-registry side is a source kind change', () => {
  assert.equal(classifyChange(registry('0.8.5'), pathDep('../rand')), 'source-kind-changed');
  assert.equal(classifyChange(workspaceDep(), registry('1.0')), 'source-kind-changed');
  assert.equal(classifyChange(pathDep('../a', '1.0'), pathDep('../b', '1.0')), 'source-kind-changed');
  assert.equal(classifyChange(registry('not-a-version'), workspaceDep()), 'source-kind-changed');
});

test('floorSeverity below 1.0.0', () => {
  const v = (major: number, minor: number, patch: number) => ({ major, minor, patch, pre: [] });
  assert.equal(floorSeverity(v(0, 1, 0), v(0, 2, 0)), 'major');
  assert.equal(floorSeverity(v(0, 1, 0), v(0, 1, 5)), 'minor');
  assert.equal(floorSeverity(v(0, 0, 3), v(0, 0, 4)), 'major');
  assert.equal(floorSeverity(v(2, 1, 0), v(2, 1, 0)), 'patch');
});

test('direction compares floors', () => {
  assert.equal(changeDirection(registry('1.0'), registry('2.0')), 'upgrade');
  assert.equal(changeDirection(registry('2'), registry('1.9.9')), 'downgrade');
  assert.equal(changeDirection(registry('1.2'), registry('~1.2')), 'lateral');
  assert.equal(changeDirection(pathDep('../x', '1.0'), registry('1.1')), 'upgrade');
  assert.equal(changeDirection(registry('1.0'), workspaceDep()), null);
  assert.equal(changeDirection(registry('not-a-version'), registry('1.0')), null);
});

function changed(before: DependencySpec, after: DependencySpec) {
  return classifyRecord({
    key: { name: 'dep', table: { kind: 'normal' } },
    kind: 'changed',
    before,
    after,
    classification: null,
    direction: null,
    unparsable: [],
  });
}

test('classifyRecord fills classification and direction on changed records', () => {
  const rec = changed(registry('1.0.217'), registry('2.0.0'));
  assert.equal(rec.classification, 'major');
  assert.equal(rec.direction, 'upgrade');
  assert.deepEqual(rec.unparsable, []);
});

test('unparsable requirements are marked on the side they occur', () => {
  const rec = changed(registry('not-a-version'), registry('1.0.0'));
  assert.equal(rec.classification, 'non-semver');
  assert.equal(rec.direction, null);
  assert.deepEqual(rec.unparsable, [
    {
      side: 'before',
      requirement: 'not-a-version',
      message: 'invalid version requirement `not-a-version`: expected major version at position 0, found `not`',
    },
  ]);
});

test('added and removed records keep a null classification', () => {
  const added = classifyRecord({
    key: { name: 'odd', table: { kind: 'dev' } },
    kind: 'added',
    before: null,
    after: registry('latest'),
    classification: null,
    direction: null,
    unparsable: [],
  });
  assert.equal(added.classification, null);
  assert.equal(added.direction, null);
  assert.deepEqual(added.unparsable.map((m) => m.side), ['after']);
});
