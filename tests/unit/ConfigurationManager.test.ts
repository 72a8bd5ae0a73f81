import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigurationManager, defaultScanConfiguration } from '../../src/core/config/ConfigurationManager';
import { isEnumValue, isValidRuleId, validateScanConfiguration } from '../../src/utils/validators/config-validator';
import { AlertThreshold, AttackStrength, LogLevel, ReportFormat, Technology } from '../../src/types/enums';

describe('ConfigurationManager', () => {
  const manager = ConfigurationManager.getInstance();

  beforeEach(() => {
    manager.reset();
  });

  it('should fill missing sections with defaults', () => {
    const config = manager.loadFromObject({ target: { technologies: [Technology.PHP] } });

    expect(config.target.technologies).toEqual([Technology.PHP]);
    expect(config.detectors.defaultThreshold).toBe(AlertThreshold.MEDIUM);
    expect(config.detectors.defaultStrength).toBe(AttackStrength.MEDIUM);
    expect(config.reporting).toEqual({ formats: [ReportFormat.CONSOLE], outputDir: 'reports' });
    expect(config.advanced).toEqual({ logLevel: LogLevel.INFO, deduplicateAlerts: true });
    expect(manager.getConfig()).toBe(config);
  });

  it('should reject an invalid configuration and keep none', () => {
    expect(() => manager.loadFromObject({ reporting: { formats: [] } })).toThrow(
      'Invalid configuration: At least one report format must be specified'
    );
    expect(manager.hasConfig()).toBe(false);
    expect(() => manager.getConfig()).toThrow('No configuration loaded');
  });

  it('should load a JSON file', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'config-'));
    const file = path.join(dir, 'scan.json');
    await fs.writeFile(file, JSON.stringify({ detectors: { disabled: [10109] }, advanced: { logLevel: 'debug' } }));

    const config = await manager.loadFromFile(file);

    expect(config.detectors.disabled).toEqual([10109]);
    expect(config.advanced.logLevel).toBe(LogLevel.DEBUG);
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should reject a file that is not an object of sections', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'config-'));
    const file = path.join(dir, 'scan.json');
    await fs.writeFile(file, '[1, 2]');

    await expect(manager.loadFromFile(file)).rejects.toThrow(`Configuration file ${file} must contain a JSON object`);
    await fs.rm(dir, { recursive: true, force: true });
  });
});

describe('validateScanConfiguration', () => {
  it('should accept the defaults', () => {
    expect(validateScanConfiguration(defaultScanConfiguration())).toEqual({ valid: true, errors: [] });
  });

  it('should report every problem', () => {
    const config = defaultScanConfiguration();
    config.detectors.disabled = [0];
    config.detectors.thresholds = { abc: AlertThreshold.LOW };
    config.diagnostics = { enabled: true, password: 'test-secret' };
    config.reporting.outputDir = ' ';

    expect(validateScanConfiguration(config).errors).toEqual([
      'Invalid rule id: 0',
      'Invalid threshold override for rule abc: low',
      'Diagnostics password given without a username',
      'Output directory is required',
    ]);
  });

  it('should check enum membership', () => {
    expect(isEnumValue(Technology, 'asp.net')).toBe(true);
    expect(isEnumValue(Technology, 'cobol')).toBe(false);
    expect(isEnumValue(Technology, 42)).toBe(false);
  });

  it('should check rule ids', () => {
    expect(isValidRuleId(10098)).toBe(true);
    expect(isValidRuleId(-1)).toBe(false);
    expect(isValidRuleId(1.5)).toBe(false);
  });
});
