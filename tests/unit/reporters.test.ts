import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { defaultScanConfiguration } from '../../src/core/config/ConfigurationManager';
import { summarizeAlerts } from '../../src/core/engine/ScanEngine';
import { SourceCodeDisclosureCve20121823Detector } from '../../src/detectors/active/SourceCodeDisclosureCve20121823Detector';
import { CrossDomainMisconfigurationDetector } from '../../src/detectors/passive/CrossDomainMisconfigurationDetector';
import { HtmlReporter } from '../../src/reporters/HtmlReporter';
import { JsonReporter } from '../../src/reporters/JsonReporter';
import { SarifReporter } from '../../src/reporters/SarifReporter';
import { createMemoryLogger, createTransaction } from '../../src/testing/helpers';
import { Alert } from '../../src/types/alert';
import { RiskLevel, ScanStatus } from '../../src/types/enums';
import { ScanResult } from '../../src/types/scan-result';

const logger = createMemoryLogger();

function buildResult(): ScanResult {
  const tx = createTransaction({
    request: { uri: 'https://api.example.com/data' },
    response: { headers: { 'Access-Control-Allow-Origin': '*' } },
  });
  const alerts: Alert[] = [
    ...new CrossDomainMisconfigurationDetector(logger).inspectResponse(tx),
    ...new SourceCodeDisclosureCve20121823Detector(logger).getExampleAlerts(),
  ];
  return {
    scanId: 'scan-1',
    targetName: 'https://api.example.com',
    status: ScanStatus.COMPLETED,
    startTime: 0,
    endTime: 5,
    duration: 5,
    transactionsScanned: 1,
    alerts,
    summary: summarizeAlerts(alerts),
    errors: [{ ruleId: 90002, message: 'boom', uri: 'https://api.example.com/data' }],
    config: defaultScanConfiguration(),
  };
}

describe('SarifReporter', () => {
  const reporter = new SarifReporter();

  it('should map risks to SARIF levels', () => {
    expect(reporter.severityToSarif(RiskLevel.HIGH)).toBe('error');
    expect(reporter.severityToSarif(RiskLevel.MEDIUM)).toBe('warning');
    expect(reporter.severityToSarif(RiskLevel.LOW)).toBe('note');
    expect(reporter.severityToSarif(RiskLevel.INFO)).toBe('note');
  });

  it('should describe each rule once and each alert as a result', () => {
    const log = reporter.toSarif(buildResult());
    const [run] = log.runs;

    expect(log.version).toBe('2.1.0');
    expect(run.tool.driver.rules.map((r) => r.id)).toEqual(['10098', '20017']);
    expect(run.tool.driver.rules[0].helpUri).toBe(
      'https://vulncat.fortify.com/en/detail?id=desc.config.dotnet.html5_overly_permissive_cors_policy'
    );
    expect(run.tool.driver.rules[0].properties.cwe).toBe('CWE-264');
    expect(run.tool.driver.rules[0].properties.wasc).toBe('WASC-14');
    expect(run.tool.driver.rules[1].properties.tags).toContain('CVE-2012-1823');

    const [cors, cve] = run.results;
    expect(cors.level).toBe('warning');
    expect(cors.locations[0].physicalLocation.artifactLocation.uri).toBe('https://api.example.com/data');
    expect(cors.properties).toEqual({ confidence: 'medium', evidence: 'Access-Control-Allow-Origin: *' });
    expect(cve.level).toBe('error');
    expect(cve.message.text).toBe("Source Code Disclosure - CVE-2012-1823: <?php echo 'example'; ?>");
    expect(cve.locations[0].physicalLocation.artifactLocation.uri).toBe('https://api.example.com');
  });
});

describe('file reporters', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'reports-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should write the JSON report under the file name template', async () => {
    const reporter = new JsonReporter();
    await reporter.init(defaultScanConfiguration(), { outputDir: dir, fileNameTemplate: 'report-{{scanId}}.json' });

    await reporter.generate(buildResult());

    const written: unknown = JSON.parse(await fs.readFile(path.join(dir, 'report-scan-1.json'), 'utf-8'));
    expect(written).toMatchObject({ scanId: 'scan-1', transactionsScanned: 1, summary: { total: 2, high: 1, medium: 1 } });
  });

  it('should render the HTML report', async () => {
    const reporter = new HtmlReporter();
    await reporter.init(defaultScanConfiguration(), { outputDir: dir });

    const html = reporter.render(buildResult());

    expect(html).toContain('<span class="risk medium">medium</span>');
    expect(html).toContain('<td class="mono">GET https://api.example.com/data</td>');
    expect(html).toContain('<pre>Access-Control-Allow-Origin: *</pre>');
    expect(html).toContain('<li>90002 on https://api.example.com/data: boom</li>');
  });

  it('should refuse to render before init', () => {
    expect(() => new HtmlReporter().render(buildResult())).toThrow('HtmlReporter used before init()');
  });
});
