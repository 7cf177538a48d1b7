import { describe, it, expect } from 'vitest';
import { SilentProgress } from '@c4graph/core';
import { OutputFormatter, createProgress } from '../cli-helpers.js';

const rows = [
  { id: '3', name: 'API', tags: ['Element', 'Container'] },
  { id: '12', name: 'Database', tags: [] },
];

describe('OutputFormatter', () => {
  it('should format JSON with two-space indentation', () => {
    expect(OutputFormatter.format({ id: '3' }, 'json')).toBe('{\n  "id": "3"\n}');
  });

  it('should format arrays of objects as YAML lists', () => {
    expect(OutputFormatter.format([rows[0]], 'yaml')).toBe(
      '- id: 3\n  name: API\n  tags:\n    - Element\n    - Container'
    );
  });

  it('should quote YAML strings that need it', () => {
    expect(OutputFormatter.format({ url: 'http://x', description: '' }, 'yaml')).toBe(
      'url: "http://x"\ndescription: ""'
    );
  });

  it('should pad table cells to the widest value', () => {
    const lines = OutputFormatter.format(rows, 'table').split('\n');

    expect(lines).toHaveLength(4);
    expect(lines[2]).toBe('3  | API      | Element, Container');
    expect(lines[3]).toBe('12 | Database | ' + ' '.repeat(18));
  });

  it('should fall back to YAML for a single object in table mode', () => {
    expect(OutputFormatter.format({ workspace: 'Shop' }, 'table')).toBe('workspace: Shop');
  });

  it('should say so when there is nothing to show', () => {
    expect(OutputFormatter.formatTable([])).toContain('No data to display');
  });
});

describe('createProgress', () => {
  it('should return a silent reporter when asked', () => {
    expect(createProgress(true)).toBeInstanceOf(SilentProgress);
    expect(createProgress()).not.toBeInstanceOf(SilentProgress);
  });
});
