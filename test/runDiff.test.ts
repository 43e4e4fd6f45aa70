import test from 'node:test';
import assert from 'node:assert/strict';
import { runDiff, type DiffReport, type DiffOptions } from '../src/core/manifest';
import { manifest } from './helpers';

function report(before: string, after: string, options?: Partial<DiffOptions>): DiffReport {
  const res = runDiff(manifest(before), manifest(after), options);
  if (!res.ok) throw new Error(res.error.message);
  return res.report;
}

test('a patch bump of serde', () => {
  const r = report('[dependencies]\nserde = "1.0.217"\n', '[dependencies]\nserde = "1.0.219"\n');
  assert.equal(r.changes.length, 1);
  const [change] = r.changes;
  assert.ok(change);
  assert.equal(change.kind, 'changed');
  assert.deepEqual(change.key, { name: 'serde', table: { kind: 'normal' } });
  assert.equal(change.classification, 'patch');
  assert.equal(change.direction, 'upgrade');
});

test('a patch bump of clap', () => {
  const r = report('[dependencies]\nclap = "4.5.23"\n', '[dependencies]\nclap = "4.5.30"\n');
  assert.deepEqual(r.changes.map((c) => c.classification), ['patch']);
});

test('adding nom', () => {
  const r = report('[dependencies]\nserde = "1"\n', '[dependencies]\nserde = "1"\nnom = "7.1.3"\n');
  assert.equal(r.changes.length, 1);
  assert.equal(r.changes[0]?.kind, 'added');
  assert.deepEqual(r.changes[0]?.key, { name: 'nom', table: { kind: 'normal' } });
  assert.equal(r.changes[0]?.classification, null);
});

test('removing nom', () => {
  const r = report('[dependencies]\nnom = "7.1.3"\n', '');
  assert.equal(r.changes.length, 1);
  assert.equal(r.changes[0]?.kind, 'removed');
  assert.deepEqual(r.removed, r.changes);
});

test('a registry dependency replaced by a path dependency', () => {
  const r = report('[dependencies]\nrand = "0.8.5"\n', '[dependencies]\nrand = { path = "../rand" }\n');
  assert.equal(r.changes.length, 1);
  assert.equal(r.changes[0]?.classification, 'source-kind-changed');
  assert.equal(r.summary.highestSeverity, null);
  assert.deepEqual(r.bySeverity['source-kind-changed'], r.changes);
});

test('workspace inheritance replaced by an explicit requirement', () => {
  const r = report('[dependencies]\nserde = { workspace = true }\n', '[dependencies]\nserde = "1.0"\n');
  assert.equal(r.changes[0]?.classification, 'source-kind-changed');
});

test('an unparsable requirement only downgrades its own record', () => {
  const r = report(
    '[dependencies]\nodd = "not-a-version"\nserde = "1.0.217"\n',
    '[dependencies]\nodd = "1.0.0"\nserde = "1.0.219"\n'
  );
  assert.deepEqual(
    r.changes.map((c) => [c.key.name, c.classification]),
    [
      ['odd', 'non-semver'],
      ['serde', 'patch'],
    ]
  );
  assert.equal(r.summary.unparsable, 1);
  assert.equal(r.summary.highestSeverity, 'patch');
  assert.deepEqual(r.changes[0]?.unparsable.map((m) => m.requirement), ['not-a-version']);
});

test('identical manifests give an empty report', () => {
  const text = '[dependencies]\nserde = "1"\n\n[dev-dependencies]\ntokio = "1"\n';
  const r = report(text, text);
  assert.deepEqual(r.changes, []);
  assert.equal(r.summary.hasChanges, false);
  assert.equal(r.summary.highestSeverity, null);
});

test('runDiff is deterministic', () => {
  const before = manifest('[dependencies]\nb = "1"\na = "0.1"\n');
  const after = manifest('[dependencies]\nc = "2"\na = "0.2"\n');
  assert.deepStrictEqual(runDiff(before, after), runDiff(before, after));
});

test('structural failures name the side', () => {
  const good = manifest('[dependencies]\nserde = "1"\n');

  const malformed = runDiff('not toml at all [', good);
  assert.equal(malformed.ok, false);
  if (!malformed.ok) {
    assert.equal(malformed.error.reason, 'malformed_manifest');
    assert.equal(malformed.error.side, 'before');
  }

  const duplicate = runDiff(good, manifest('[build-dependencies]\ncc = "1"\n\n[build_dependencies]\ncc = "1"\n'));
  assert.equal(duplicate.ok, false);
  if (!duplicate.ok) {
    assert.equal(duplicate.error.reason, 'duplicate_dependency_key');
    assert.equal(duplicate.error.side, 'after');
    assert.deepEqual(duplicate.error.key, { name: 'cc', table: { kind: 'build' } });
  }
});

const TABLES_BEFORE = `
[dependencies]
serde = "1.0.217"

[dev-dependencies]
tokio = "1.39"

[build-dependencies]
cc = "1.0"

[target.'cfg(unix)'.dev-dependencies]
nix = "0.28"
`;

const TABLES_AFTER = `
[dependencies]
serde = "1.0.219"

[dev-dependencies]
tokio = "1.40"

[build-dependencies]
cc = "1.1"

[target.'cfg(unix)'.dev-dependencies]
nix = "0.29"
`;

test('dev tables, including target ones, can be left out', () => {
  const r = report(TABLES_BEFORE, TABLES_AFTER, { includeDevDependencies: false });
  assert.deepEqual(r.changes.map((c) => c.key.name), ['cc', 'serde']);
  assert.equal(r.summary.suppressed, 0);
});

test('build tables can be left out', () => {
  const r = report(TABLES_BEFORE, TABLES_AFTER, { includeBuildDependencies: false });
  assert.deepEqual(r.changes.map((c) => c.key.name), ['nix', 'serde', 'tokio']);
});

test('changes below the minimum severity are counted but not reported', () => {
  const r = report(TABLES_BEFORE, TABLES_AFTER, { minimumReportedSeverity: 'minor' });
  assert.deepEqual(
    r.changes.map((c) => [c.key.name, c.classification]),
    [
      ['cc', 'minor'],
      ['nix', 'major'],
      ['tokio', 'minor'],
    ]
  );
  assert.equal(r.summary.suppressed, 1);
  assert.equal(r.summary.highestSeverity, 'major');
});

test('the minimum severity never hides added, removed or unclassifiable records', () => {
  const r = report(
    '[dependencies]\nold = "1"\nodd = "latest"\nrand = "0.8"\nserde = "1.0.1"\n',
    '[dependencies]\nnew = "1"\nodd = "1"\nrand = { git = "https://example.com/rand.git" }\nserde = "1.0.2"\n',
    { minimumReportedSeverity: 'major' }
  );
  assert.deepEqual(
    r.changes.map((c) => `${c.kind} ${c.key.name}`),
    ['added new', 'removed old', 'changed odd', 'changed rand']
  );
  assert.equal(r.summary.suppressed, 1);
});
