import { describe, it, expect, vi, beforeEach } from 'vitest';
import { runCreateDoc } from '../src/cli/create-doc.js';
import { FakeWorkspaceClient, TEST_KEY } from './helpers/fake-workspace-client.js';

function io(files: Record<string, string>, extra: { client?: FakeWorkspaceClient } = {}) {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    options: {
      readText: async (path: string) => {
        const text = files[path];
        if (text === undefined) throw new Error(`ENOENT: no such file, open '${path}'`);
        return text;
      },
      env: { GOOGLE_CREDENTIALS_FILE: '/nonexistent/google-credentials.json', GOOGLE_CREDENTIALS_JSON: JSON.stringify(TEST_KEY) },
      clientFactory: () => extra.client ?? new FakeWorkspaceClient(),
      out: (line: string) => out.push(line),
      err: (line: string) => err.push(line),
    },
  };
}

describe('create-doc CLI', () => {
  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
  });

  it('prints usage without arguments', async () => {
    const { options, err } = io({});
    expect(await runCreateDoc([], options)).toBe(2);
    expect(err).toEqual(['Usage: create-doc <plan.json> <recipient-email> [--dry-run]']);
  });

  it('prints the operations on a dry run', async () => {
    const { options, out } = io({ 'plan.json': JSON.stringify({ topic: 'AI trends' }) });
    expect(await runCreateDoc(['plan.json', '--dry-run'], options)).toBe(0);
    const printed: { title: string; operations: Array<{ kind: string }> } = JSON.parse(out[0] ?? '');
    expect(printed.title).toBe('Short-form Content Plan: Untitled');
    expect(printed.operations.map(op => op.kind)).toEqual(['insertText', 'setParagraphStyle', 'setTextStyle']);
  });

  it('rejects an invalid plan on a dry run', async () => {
    const { options, err } = io({ 'plan.json': JSON.stringify({ scenes: [] }) });
    expect(await runCreateDoc(['plan.json', '--dry-run'], options)).toBe(1);
    expect(err).toEqual(['Invalid content plan: topic: Topic is required']);
  });

  it('creates and shares the document', async () => {
    const client = new FakeWorkspaceClient();
    const { options, out } = io({ 'plan.json': JSON.stringify({ title: 'Tips', topic: 'Cooking' }) }, { client });
    expect(await runCreateDoc(['plan.json', 'user@example.com'], options)).toBe(0);
    expect(JSON.parse(out[0] ?? '')).toEqual({
      document_id: 'doc-123',
      share_link: 'https://docs.google.com/document/d/doc-123/edit',
      permission_granted: true,
    });
    expect(client.created).toEqual(['Short-form Content Plan: Tips']);
  });

  it('fails when the plan file cannot be read', async () => {
    const { options, err } = io({});
    expect(await runCreateDoc(['missing.json', 'user@example.com'], options)).toBe(1);
    expect(err[0]).toBe("Could not read plan from missing.json: ENOENT: no such file, open 'missing.json'");
  });
});
