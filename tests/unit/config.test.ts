import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import {
  ConfigError,
  getDefaultConfig,
  loadConfig,
  mergeWithDefaults,
  saveConfig,
} from '../../src/utils/config';

describe('config', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'stylewise-config-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should use defaults when no file exists', () => {
    expect(loadConfig(tempDir)).toEqual(getDefaultConfig());
  });

  it('should merge a partial YAML file over the defaults', () => {
    fs.writeFileSync(
      path.join(tempDir, 'stylewise.config.yaml'),
      'detector:\n  maxParameters: 3\n  disabledRules:\n    - todo_comments\nprofile:\n  storeTimeoutMs: 500\n',
      'utf-8',
    );
    const config = loadConfig(tempDir);

    expect(config.detector.maxParameters).toBe(3);
    expect(config.detector.disabledRules).toEqual(['todo_comments']);
    expect(config.detector.maxNestingDepth).toBe(4);
    expect(config.profile.storeTimeoutMs).toBe(500);
    expect(config.recommendation).toEqual(getDefaultConfig().recommendation);
  });

  it('should read JSON configuration', () => {
    fs.writeFileSync(
      path.join(tempDir, 'stylewise.config.json'),
      JSON.stringify({ recommendation: { summaryTopN: 3 } }),
      'utf-8',
    );

    expect(loadConfig(tempDir).recommendation.summaryTopN).toBe(3);
  });

  it('should reject invalid values with the offending path', () => {
    fs.writeFileSync(path.join(tempDir, 'stylewise.config.yaml'), 'detector:\n  maxParameters: -1\n', 'utf-8');

    expect(() => loadConfig(tempDir)).toThrow(ConfigError);
    expect(() => loadConfig(tempDir)).toThrow(/detector\.maxParameters/);
  });

  it('should treat an empty file as no overrides', () => {
    fs.writeFileSync(path.join(tempDir, 'stylewise.config.yaml'), '', 'utf-8');

    expect(loadConfig(tempDir)).toEqual(getDefaultConfig());
  });

  it('should round-trip a saved configuration', () => {
    const config = mergeWithDefaults({ detector: { maxLineLength: 120 } });
    saveConfig(tempDir, config);

    expect(loadConfig(tempDir)).toEqual(config);
  });

  it('should hand out independent default objects', () => {
    const first = getDefaultConfig();
    first.detector.disabledRules.push('long_line');

    expect(getDefaultConfig().detector.disabledRules).toEqual([]);
  });
});
