import test from 'node:test';
import assert from 'node:assert/strict';
import { runDiff, type DiffOptions, type DiffReport } from '../src/core/manifest';
import { describeSpec, renderInspect, renderReport, tableLabel } from '../src/cli/format';
import { manifest, pathDep, registry, workspaceDep } from './helpers';

function diffReport(before: string, after: string, options?: Partial<DiffOptions>): DiffReport {
  const res = runDiff(manifest(before), manifest(after), options);
  if (!res.ok) throw new Error(res.error.message);
  return res.report;
}

test('every record kind renders on its own line', () => {
  const r = diffReport(
    `
[dependencies]
serde = "1.0.217"
rand = "0.8.5"
odd = "not-a-version"

[dev-dependencies]
tokio = "1.40"

[build-dependencies]
log = "0.4.22"
`,
    `
[dependencies]
serde = "2.0.0"
rand = { path = "../rand" }
odd = "1.0.0"
nom = "7.1.3"

[dev-dependencies]
tokio = "1.39"
`
  );
  assert.equal(
    renderReport(r, 'non-semver'),
    [
      '✨ add nom 7.1.3',
      '🗑️ remove log (🧱 build-dependencies) 0.4.22',
      '🤷 change odd from not-a-version to 1.0.0',
      '🔀 change rand from 0.8.5 to path ../rand',
      '❗ bump serde from 1.0.217 to 2.0.0',
      '📦 drop tokio (🖥️ dev-dependencies) from 1.40 to 1.39',
    ].join('\n')
  );
});

test('an empty report says so', () => {
  const r = diffReport('[dependencies]\nserde = "1"\n', '[dependencies]\nserde = "1"\n');
  assert.equal(renderReport(r, 'non-semver'), '🧹 No changes detected.');
});

test('hidden changes are counted under the output', () => {
  const r = diffReport('[dependencies]\nserde = "1.0.1"\n', '[dependencies]\nserde = "1.0.2"\n', {
    minimumReportedSeverity: 'major',
  });
  assert.equal(renderReport(r, 'major'), '🧹 No changes detected.\n(1 change(s) below major not shown)');
});

test('attribute edits are listed after the requirement', () => {
  const r = diffReport(
    '[dependencies]\nserde = { version = "1", features = ["derive"] }\n',
    '[dependencies]\nserde = { version = "1", features = ["derive", "rc"], default-features = false }\n'
  );
  assert.equal(
    renderReport(r, 'non-semver'),
    '🔧 change serde from 1 to 1 (features [derive] → [derive, rc]; default-features unset → false)'
  );
});

test('pre-release and unparsable added records', () => {
  const r = diffReport(
    '[dependencies]\nbeta = "1.0.0-beta.1"\n',
    '[dependencies]\nbeta = "1.0.0-beta.2"\n\n[workspace.dependencies]\nweird = "latest"\n'
  );
  assert.equal(
    renderReport(r, 'non-semver'),
    [
      '✨ add weird (🗂️ workspace.dependencies) latest (unparsable requirement)',
      '🧪 bump beta from 1.0.0-beta.1 to 1.0.0-beta.2',
    ].join('\n')
  );
});

test('table labels', () => {
  assert.equal(tableLabel({ kind: 'normal' }), '');
  assert.equal(tableLabel({ kind: 'workspace' }), ' (🗂️ workspace.dependencies)');
  assert.equal(tableLabel({ kind: 'target', target: 'cfg(unix)', section: 'normal' }), ' (🎯 cfg(unix) dependencies)');
  assert.equal(
    tableLabel({ kind: 'target', target: 'cfg(windows)', section: 'dev' }),
    ' (🎯 cfg(windows) dev-dependencies)'
  );
  assert.equal(
    tableLabel({ kind: 'target', target: 'wasm32-unknown-unknown', section: 'build' }),
    ' (🎯 wasm32-unknown-unknown build-dependencies)'
  );
});

test('source descriptions', () => {
  assert.equal(describeSpec(registry('^1.2')), '^1.2');
  assert.equal(
    describeSpec({ ...registry('2'), source: { kind: 'registry', requirement: '2', registry: 'internal' } }),
    '2 (registry internal)'
  );
  assert.equal(describeSpec(pathDep('../core')), 'path ../core');
  assert.equal(describeSpec(pathDep('../core', '0.3')), 'path ../core 0.3');
  assert.equal(
    describeSpec({
      ...registry(''),
      source: { kind: 'git', url: 'https://example.com/x.git', ref: { kind: 'branch', value: 'main' }, requirement: null },
    }),
    'git https://example.com/x.git branch main'
  );
  assert.equal(describeSpec(workspaceDep()), 'workspace');
});

test('inspect rows', () => {
  assert.equal(renderInspect([]), 'No dependencies declared.');
  assert.equal(
    renderInspect([
      { name: 'serde', table: '', source: '1.0', floor: '1.0.0', unparsable: null },
      { name: 'odd', table: ' (🖥️ dev-dependencies)', source: 'latest', floor: null, unparsable: 'bad' },
      { name: 'core', table: '', source: 'path ../core', floor: null, unparsable: null },
    ]),
    ['serde 1.0 (floor 1.0.0)', 'odd (🖥️ dev-dependencies) latest (unparsable requirement)', 'core path ../core'].join('\n')
  );
});
