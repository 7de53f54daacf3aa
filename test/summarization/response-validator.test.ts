import { describe, it, expect } from 'vitest';
import { validateSummaryResponse } from '../../src/summarization/response-validator.js';

describe('validateSummaryResponse', () => {
  it('passes markup through untouched', () => {
    expect(validateSummaryResponse('<div>hi</div>')).toEqual({
      kind: 'html',
      html: '<div>hi</div>',
      metadata: { format: 'html' },
    });
  });

  it('trims surrounding whitespace', () => {
    expect(validateSummaryResponse('\n  <p>x</p>\n').html).toBe('<p>x</p>');
  });

  it('wraps plain text in a summary container', () => {
    expect(validateSummaryResponse('Just some prose.')).toEqual({
      kind: 'wrapped_text',
      html: '<div class="paper-summary">Just some prose.</div>',
      metadata: { format: 'html' },
    });
  });

  it('extracts the summary field from a JSON object and keeps it as metadata', () => {
    const reply = JSON.stringify({ summary: '<section>s</section>', significance: 'High' });

    expect(validateSummaryResponse(reply)).toEqual({
      kind: 'structured',
      html: '<section>s</section>',
      metadata: { summary: '<section>s</section>', significance: 'High' },
    });
  });

  it('falls back to the wrapped reply when a JSON object has no summary', () => {
    const reply = '{"title":"T"}';
    const result = validateSummaryResponse(reply);

    expect(result.kind).toBe('structured');
    expect(result.html).toBe('<div class="paper-summary">{"title":"T"}</div>');
    expect(result.metadata).toEqual({ title: 'T' });
  });

  it('unwraps a fenced code block', () => {
    const reply = '```html\n<div class="paper-summary">ok</div>\n```';
    expect(validateSummaryResponse(reply)).toEqual({
      kind: 'html',
      html: '<div class="paper-summary">ok</div>',
      metadata: { format: 'html' },
    });
  });

  it('treats text that only looks like JSON as prose', () => {
    expect(validateSummaryResponse('{not json').html).toBe('<div class="paper-summary">{not json</div>');
  });

  it('wraps an empty reply as an empty summary', () => {
    expect(validateSummaryResponse('')).toEqual({
      kind: 'wrapped_text',
      html: '<div class="paper-summary"></div>',
      metadata: { format: 'html' },
    });
    expect(validateSummaryResponse('  \n ').html).toBe('<div class="paper-summary"></div>');
  });
});
