import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { SidecarPathError } from '../../src/errors.js';
import { SidecarStore, previewArtifactName } from '../../src/sidecar-store.js';

describe('SidecarStore', () => {
  let root: string;
  let unit: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'sidecar-test-'));
    unit = path.join(root, 'blog', 'posts_controller.rb');
    fs.mkdirSync(path.dirname(unit), { recursive: true });
    fs.writeFileSync(unit, 'class PostsController\nend\n');
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('writes beside the unit under the sidecar directory', () => {
    const store = new SidecarStore({ allowedRoots: [root] });

    const written = store.write(unit, 'analysis.json', '{}');

    expect(written).toBe(path.join(root, 'blog', '.harden', 'posts_controller', 'analysis.json'));
    expect(fs.readFileSync(written, 'utf-8')).toBe('{}\n');
  });

  it('does not add a second trailing newline', () => {
    const store = new SidecarStore();

    store.write(unit, 'hardened_preview.rb', 'class X\nend\n');

    expect(store.read(unit, 'hardened_preview.rb')).toBe('class X\nend\n');
  });

  it('pretty-prints JSON artifacts', () => {
    const store = new SidecarStore();

    store.writeJson(unit, 'decision.json', { action: 'skip' });

    expect(store.read(unit, 'decision.json')).toBe('{\n  "action": "skip"\n}\n');
  });

  it('reads a missing artifact as null', () => {
    expect(new SidecarStore().read(unit, 'verification.json')).toBeNull();
  });

  it('lists the artifacts on disk', () => {
    const store = new SidecarStore({ dirName: '.review' });
    expect(store.list(unit)).toEqual([]);

    store.write(unit, 'verification.json', '{}');
    store.write(unit, 'analysis.json', '{}');

    expect(store.list(unit)).toEqual(['analysis.json', 'verification.json']);
    expect(fs.existsSync(path.join(root, 'blog', '.review', 'posts_controller'))).toBe(true);
  });

  it('refuses to write outside the allowed roots', () => {
    const elsewhere = fs.mkdtempSync(path.join(os.tmpdir(), 'sidecar-other-'));
    try {
      const store = new SidecarStore({ allowedRoots: [path.join(root, 'blog')] });
      const outside = path.join(elsewhere, 'users_controller.rb');

      expect(() => store.write(outside, 'analysis.json', '{}')).toThrow(SidecarPathError);
      expect(fs.existsSync(path.join(elsewhere, '.harden'))).toBe(false);
    } finally {
      fs.rmSync(elsewhere, { recursive: true, force: true });
    }
  });

  it('refuses a sidecar directory that resolves outside through a symlink', () => {
    const elsewhere = fs.mkdtempSync(path.join(os.tmpdir(), 'sidecar-other-'));
    try {
      fs.symlinkSync(elsewhere, path.join(root, 'blog', '.harden'));
      const store = new SidecarStore({ allowedRoots: [root] });

      expect(() => store.write(unit, 'analysis.json', '{}')).toThrow(SidecarPathError);
    } finally {
      fs.rmSync(elsewhere, { recursive: true, force: true });
    }
  });

  it('names the preview after the unit extension', () => {
    expect(previewArtifactName('/app/controllers/posts_controller.rb')).toBe('hardened_preview.rb');
  });
});
