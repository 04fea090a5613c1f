import { describe, expect, it } from 'vitest';
import { ConfigBuilder, ConfigValidationError, DEFAULT_TIMEOUT_MS } from '../../src/models/config.js';
import { LLMProvider } from '../../src/llm/interfaces.js';
import { ExtractionStrategyName } from '../../src/models/types.js';

const NOW = new Date(2024, 2, 5, 9, 7, 3);

describe('ConfigBuilder', () => {
  it('fills in defaults', () => {
    const config = new ConfigBuilder(() => NOW).setCompany('  Acme Corp ').build();

    expect(config).toEqual({
      company: 'Acme Corp',
      outputFile: 'Acme_Corp_API_Documentation_20240305_090703.xlsx',
      timeout: DEFAULT_TIMEOUT_MS,
      probeConcurrency: 1,
      contentCheck: true,
      aiFallback: true,
      provider: LLMProvider.OPENROUTER,
      apiKey: undefined,
      model: undefined,
      strategies: ['code-block', 'table', 'heading-link', 'loose-text'],
      verbose: false,
      debug: false,
      dryRun: false,
    });
  });

  it('requires a company name', () => {
    expect(() => new ConfigBuilder().build()).toThrow('Company name is required');
    expect(() => new ConfigBuilder().setCompany('   ')).toThrow(ConfigValidationError);
  });

  it('requires an .xlsx output file', () => {
    expect(() => new ConfigBuilder().setOutputFile('report.csv')).toThrow('Output file must end in .xlsx: report.csv');
    expect(new ConfigBuilder().setCompany('Acme').setOutputFile('out/Report.XLSX').build().outputFile).toBe('out/Report.XLSX');
  });

  it('rejects timeouts under one second', () => {
    expect(() => new ConfigBuilder().setTimeout(999)).toThrow('Timeout must be at least 1000ms');
    expect(() => new ConfigBuilder().setTimeout(Number.NaN)).toThrow(ConfigValidationError);
  });

  it('rejects a probe concurrency below one or not whole', () => {
    expect(() => new ConfigBuilder().setProbeConcurrency(0)).toThrow(ConfigValidationError);
    expect(() => new ConfigBuilder().setProbeConcurrency(1.5)).toThrow(ConfigValidationError);
  });

  it('accepts providers case-insensitively and rejects unknown ones', () => {
    expect(new ConfigBuilder().setCompany('Acme').setProvider('Anthropic').build().provider).toBe(LLMProvider.ANTHROPIC);
    expect(() => new ConfigBuilder().setProvider('cohere')).toThrow(
      'Invalid provider: cohere. Must be one of: openai, anthropic, gemini, openrouter'
    );
  });

  it('de-duplicates strategies and rejects unknown names', () => {
    const config = new ConfigBuilder().setCompany('Acme').setStrategies(['table', ' TABLE', 'code-block']).build();

    expect(config.strategies).toEqual([ExtractionStrategyName.TABLE, ExtractionStrategyName.CODE_BLOCK]);
    expect(() => new ConfigBuilder().setStrategies(['regex'])).toThrow(
      'Invalid strategy: regex. Must be one of: code-block, table, heading-link, loose-text'
    );
    expect(() => new ConfigBuilder().setStrategies([])).toThrow('At least one extraction strategy is required');
  });

  it('records the key that failed validation', () => {
    try {
      new ConfigBuilder().setTimeout(10);
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      expect(error instanceof ConfigValidationError && error.configKey).toBe('timeout');
      return;
    }
    expect.unreachable('setTimeout should have thrown');
  });
});

describe('ConfigBuilder.fromCliArgs', () => {
  it('maps every CLI argument', () => {
    const config = ConfigBuilder.fromCliArgs({
      company: 'Acme',
      output: 'exports/acme.xlsx',
      timeout: 5000,
      concurrency: 4,
      contentCheck: false,
      ai: false,
      provider: 'gemini',
      apiKey: 'test-secret',
      model: 'gemini-1.5-flash-latest',
      strategies: 'table,loose-text',
      verbose: true,
      debug: true,
      dryRun: true,
    });

    expect(config).toEqual({
      company: 'Acme',
      outputFile: 'exports/acme.xlsx',
      timeout: 5000,
      probeConcurrency: 4,
      contentCheck: false,
      aiFallback: false,
      provider: LLMProvider.GEMINI,
      apiKey: 'test-secret',
      model: 'gemini-1.5-flash-latest',
      strategies: [ExtractionStrategyName.TABLE, ExtractionStrategyName.LOOSE_TEXT],
      verbose: true,
      debug: true,
      dryRun: true,
    });
  });

  it('requires the company argument', () => {
    expect(() => ConfigBuilder.fromCliArgs({})).toThrow('Company name is required');
  });
});
