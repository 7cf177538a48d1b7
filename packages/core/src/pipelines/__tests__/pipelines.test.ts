import { describe, it, expect, vi } from 'vitest';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { loadWorkspace } from '../load-workspace.js';
import { runElements } from '../elements.js';
import { runRelationships } from '../relationships.js';
import { auditModel, runValidate } from '../validate.js';
import { displayNameOf } from '../describe.js';
import { InteractionStyle } from '../../model/interaction-style.js';
import { Workspace } from '../../model/workspace.js';
import { C4GraphError, ErrorCode } from '../../errors.js';
import type { ProgressReporter } from '../progress.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const WORKSPACE_PATH = join(__dirname, 'fixtures', 'workspace.json');
const CLEAN_PATH = join(__dirname, 'fixtures', 'clean.json');

function createMockProgress() {
  return {
    section: vi.fn(),
    start: vi.fn(),
    succeed: vi.fn(),
    fail: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
  } satisfies ProgressReporter;
}

describe('loadWorkspace', () => {
  it('should load a workspace file and report what it found', async () => {
    const progress = createMockProgress();
    const workspace = await loadWorkspace(WORKSPACE_PATH, progress);

    expect(workspace.name).toBe('Shop');
    expect(progress.start).toHaveBeenCalledWith('Loading workspace');
    expect(progress.succeed).toHaveBeenCalledWith('Loaded workspace "Shop" with 8 elements');
  });

  it('should throw IO_FILE_NOT_FOUND for a missing file', async () => {
    const missing = join(__dirname, 'fixtures', 'missing.json');

    await expect(loadWorkspace(missing)).rejects.toBeInstanceOf(C4GraphError);
    await expect(loadWorkspace(missing)).rejects.toMatchObject({
      code: ErrorCode.IO_FILE_NOT_FOUND,
    });
  });

  it('should refuse a directory', async () => {
    await expect(loadWorkspace(join(__dirname, 'fixtures'))).rejects.toMatchObject({
      code: ErrorCode.IO_FILE_NOT_FOUND,
      message: `Path is not a file: ${join(__dirname, 'fixtures')}`,
    });
  });
});

describe('runElements', () => {
  it('should list every element', async () => {
    const rows = await runElements({ workspacePath: WORKSPACE_PATH });

    expect(rows.map((r) => r.canonicalName)).toEqual([
      '/Customer',
      '/Shop',
      '/Shop/Web',
      '/Shop/API',
      '/Shop/API/Orders',
      '/Deployment/Live/Server',
      '/Shop/API[1]',
      '[99][1]',
    ]);
  });

  it('should filter by element type', async () => {
    const rows = await runElements({ workspacePath: WORKSPACE_PATH, type: 'ContainerInstance' });

    expect(rows).toEqual([
      {
        id: '7',
        type: 'ContainerInstance',
        name: 'API[1]',
        canonicalName: '/Shop/API[1]',
        tags: ['Element', 'Container', 'Container Instance'],
        parentId: '2',
      },
      {
        id: '8',
        type: 'ContainerInstance',
        name: '99[1]',
        canonicalName: '[99][1]',
        tags: [],
        parentId: null,
      },
    ]);
  });

  it('should report the parent of nested elements', async () => {
    const rows = await runElements({ workspacePath: WORKSPACE_PATH, type: 'Component' });

    expect(rows).toEqual([
      {
        id: '5',
        type: 'Component',
        name: 'Orders',
        canonicalName: '/Shop/API/Orders',
        tags: ['Element', 'Component'],
        parentId: '4',
      },
    ]);
  });

  it('should report the element count', async () => {
    const progress = createMockProgress();
    await runElements({ workspacePath: WORKSPACE_PATH, type: 'Person' }, progress);

    expect(progress.section).toHaveBeenCalledWith('Loading Architecture Workspace');
    expect(progress.succeed).toHaveBeenLastCalledWith('Found 1 element(s)');
  });
});

describe('runRelationships', () => {
  it('should describe relationships by canonical name', async () => {
    const rows = await runRelationships({ workspacePath: WORKSPACE_PATH });

    expect(rows).toEqual([
      {
        id: '10',
        source: '/Customer',
        destination: '/Shop/Web',
        description: 'Uses',
        technology: 'HTTPS',
        interactionStyle: InteractionStyle.Synchronous,
      },
      {
        id: '11',
        source: '/Shop/Web',
        destination: '/Shop/API',
        description: 'Calls',
        technology: 'JSON/HTTPS',
        interactionStyle: InteractionStyle.Synchronous,
      },
    ]);
  });
});

describe('displayNameOf', () => {
  it('should name container instances after their container', () => {
    const model = new Workspace('Test').model;
    const api = model.addSoftwareSystem('Shop').addContainer('API');
    const instance = model.addDeploymentNode('Server').add(api);

    expect(displayNameOf(instance)).toBe('API[1]');
    expect(displayNameOf(api)).toBe('API');
  });
});

describe('auditModel', () => {
  it('should report orphans and deployment problems', async () => {
    const workspace = await loadWorkspace(WORKSPACE_PATH);
    const findings = auditModel(workspace.model, { requireDescriptions: false });

    expect(findings).toEqual([
      {
        checkId: 'ORPHAN_ELEMENT',
        severity: 'info',
        elementId: '2',
        message: 'Shop has no relationships',
      },
      {
        checkId: 'ORPHAN_ELEMENT',
        severity: 'info',
        elementId: '5',
        message: 'Orders has no relationships',
      },
      {
        checkId: 'UNRESOLVED_CONTAINER_INSTANCE',
        severity: 'error',
        elementId: '8',
        message: 'Container instance 8 refers to unknown container 99',
      },
      {
        checkId: 'INSTANCE_WITHOUT_HEALTH_CHECKS',
        severity: 'info',
        elementId: '8',
        message: '99[1] has no health checks',
      },
    ]);
  });

  it('should report missing descriptions when required', async () => {
    const workspace = await loadWorkspace(WORKSPACE_PATH);
    const findings = auditModel(workspace.model, { requireDescriptions: true }).filter(
      (f) => f.checkId === 'MISSING_DESCRIPTION'
    );

    expect(findings.map((f) => f.message)).toEqual([
      'Web has no description',
      'Server has no description',
    ]);
    expect(findings.every((f) => f.severity === 'warning')).toBe(true);
  });
});

describe('runValidate', () => {
  it('should summarise findings by severity', async () => {
    const progress = createMockProgress();
    const result = await runValidate(
      { workspacePath: WORKSPACE_PATH, requireDescriptions: true, failOnWarnings: false },
      progress
    );

    expect(result.workspace).toBe('Shop');
    expect(result.elements).toBe(8);
    expect(result.relationships).toBe(2);
    expect(result.summary).toEqual({ error: 1, warning: 2, info: 3 });
    expect(result.hasIssues).toBe(true);
    expect(progress.fail).toHaveBeenCalledWith('1 error(s) found');
    expect(progress.warn).toHaveBeenCalledWith('2 warning(s) found');
  });

  it('should pass a clean workspace', async () => {
    const progress = createMockProgress();
    const result = await runValidate(
      { workspacePath: CLEAN_PATH, requireDescriptions: false, failOnWarnings: true },
      progress
    );

    expect(result.findings).toEqual([]);
    expect(result.hasIssues).toBe(false);
    expect(progress.succeed).toHaveBeenLastCalledWith('No integrity problems found');
  });

  it('should treat warnings as issues only when asked to', async () => {
    const lenient = await runValidate({
      workspacePath: CLEAN_PATH,
      requireDescriptions: true,
      failOnWarnings: false,
    });
    const strict = await runValidate({
      workspacePath: CLEAN_PATH,
      requireDescriptions: true,
      failOnWarnings: true,
    });

    expect(lenient.summary).toEqual({ error: 0, warning: 1, info: 0 });
    expect(lenient.findings[0]?.message).toBe('Shop has no description');
    expect(lenient.hasIssues).toBe(false);
    expect(strict.hasIssues).toBe(true);
  });
});
