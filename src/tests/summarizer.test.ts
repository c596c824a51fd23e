import { describe, it, expect } from '@jest/globals';
import { parseCategory, parseKeywords, Summarizer } from '../services/summarizer.js';
import { FakeGenerator, silentLogger } from './helpers.js';

describe('Summarizer', () => {
  it('truncates the input and returns the trimmed reply with the model name', async () => {
    const generator = new FakeGenerator(['  ## Summary\n- x  ']);
    const result = await new Summarizer(generator, 10, silentLogger).summarize('abcdefghijklmnop');

    expect(result).toEqual({ summary: '## Summary\n- x', model: 'fake-model' });
    expect(generator.prompts[0]).toContain('Content:\nabcdefghij\n\nResponse format:');
    expect(generator.prompts[0]).toContain('3-5 bullet points');
  });

  it('extracts keywords from a short excerpt at low temperature', async () => {
    const generator = new FakeGenerator(['ai, data, ai']);
    const keywords = await new Summarizer(generator, 10, silentLogger).extractKeywords('z'.repeat(3000), 3);

    expect(keywords).toEqual(['ai', 'data']);
    expect(generator.requests[0].temperature).toBe(0.2);
    expect(generator.prompts[0]).toContain('Extract the 3 most important keywords');
    expect(generator.prompts[0]).toContain(`Content:\n${'z'.repeat(2000)}\n\nKeywords:`);
  });

  it('categorizes into one of the known categories', async () => {
    const generator = new FakeGenerator(['Health.', 'no idea']);
    const summarizer = new Summarizer(generator, 10, silentLogger);

    await expect(summarizer.categorize('Sleep and exercise')).resolves.toBe('Health');
    await expect(summarizer.categorize('???')).resolves.toBe('Other');
    expect(generator.requests.map((r) => r.temperature)).toEqual([0.1, 0.1]);
  });
});

describe('parseKeywords', () => {
  it('strips list markers and quotes and drops duplicates', () => {
    expect(parseKeywords('- AI, machine learning, "Neural Nets", ai\n3) data', 5)).toEqual([
      'AI',
      'machine learning',
      'Neural Nets',
      'data',
    ]);
  });

  it('accepts a bracketed list and honours the maximum', () => {
    expect(parseKeywords('[alpha, beta, gamma]', 2)).toEqual(['alpha', 'beta']);
  });
});

describe('parseCategory', () => {
  it('takes the first category named in the reply', () => {
    expect(parseCategory('Category: science, though arguably Technology')).toBe('Science');
  });

  it('falls back to Other', () => {
    expect(parseCategory('cooking')).toBe('Other');
  });
});
