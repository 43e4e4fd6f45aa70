import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import type { RevisionContentProvider, RevisionText } from '../src/core/revision';
import type { DependencySpec } from '../src/core/manifest';

export function manifest(body: string): string {
  return `[package]\nname = "demo"\nversion = "0.1.0"\nedition = "2021"\n\n${body}`;
}

export function registry(requirement: string): DependencySpec {
  return {
    source: { kind: 'registry', requirement, registry: null },
    features: null,
    defaultFeatures: null,
    optional: false,
    package: null,
  };
}

export function pathDep(p: string, requirement: string | null = null): DependencySpec {
  return { ...registry(''), source: { kind: 'path', path: p, requirement } };
}

export function workspaceDep(): DependencySpec {
  return { ...registry(''), source: { kind: 'workspace' } };
}

/** Serves fixed manifest texts by revision name and records every request. */
export class InMemoryRevisionProvider implements RevisionContentProvider {
  readonly requested: string[] = [];

  constructor(private readonly texts: Record<string, string>) {}

  async getManifestText(revision: string): Promise<RevisionText> {
    this.requested.push(revision);
    const text = this.texts[revision];
    if (text === undefined) {
      return { ok: false, error: { reason: 'retrieval_failed', revision, message: `no manifest at ${revision}` } };
    }
    return { ok: true, text };
  }
}

export async function createTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `manifest-diff-${prefix}-`));
}
