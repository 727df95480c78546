/**
 * @fileoverview Tests for the pretty-print context renderer
 */

import { describe, it, expect } from 'vitest';
import { renderContext } from '../src/formats.js';

describe('renderContext', () => {
  it('should return an empty string without fields', () => {
    expect(renderContext({})).toBe('');
  });

  it('should place component and operation first, unquoted', () => {
    const rendered = renderContext({
      increment: 0.25,
      operation: 'increment',
      component: 'workday-calendar',
    });

    expect(rendered).toBe(' component=workday-calendar operation=increment increment=0.25');
  });

  it('should JSON-encode remaining values', () => {
    expect(renderContext({ start: '2004-01-01 15:07', ok: false })).toBe(
      ' start="2004-01-01 15:07" ok=false'
    );
  });

  it('should skip winston internal fields', () => {
    expect(renderContext({ stack: 'Error: x', splat: [], date: '2024-07-04' })).toBe(
      ' date="2024-07-04"'
    );
  });
});
