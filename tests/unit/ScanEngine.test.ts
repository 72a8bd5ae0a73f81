import { ScanEngine } from '../../src/core/engine/ScanEngine';
import { DetectorMetadata } from '../../src/core/interfaces/IDetector';
import { BasePassiveDetector } from '../../src/core/interfaces/IPassiveDetector';
import { defaultScanConfiguration } from '../../src/core/config/ConfigurationManager';
import { HttpTransaction } from '../../src/core/http/HttpMessage';
import { CrossDomainMisconfigurationDetector } from '../../src/detectors/passive/CrossDomainMisconfigurationDetector';
import { ModernAppDetector } from '../../src/detectors/passive/ModernAppDetector';
import { SourceCodeDisclosureCve20121823Detector } from '../../src/detectors/active/SourceCodeDisclosureCve20121823Detector';
import { BaseReporter } from '../../src/reporters/base/IReporter';
import { DetectorRegistry } from '../../src/utils/DetectorRegistry';
import {
  AlertCollector,
  createMemoryLogger,
  createTransaction,
  RecordingTransport,
} from '../../src/testing/helpers';
import { Alert } from '../../src/types/alert';
import { ScanConfiguration } from '../../src/types/config';
import {
  AlertThreshold,
  ConfidenceLevel,
  DetectorCategory,
  ReportFormat,
  RiskLevel,
  ScanStatus,
  Technology,
} from '../../src/types/enums';
import { ScanResult } from '../../src/types/scan-result';

const logger = createMemoryLogger();

class ThrowingDetector extends BasePassiveDetector {
  readonly metadata: DetectorMetadata = {
    id: 1,
    name: 'Throwing',
    description: '',
    solution: '',
    references: [],
    category: DetectorCategory.MISC,
    risk: RiskLevel.LOW,
    confidence: ConfidenceLevel.LOW,
    cweId: 0,
    wascId: 0,
    tags: {},
  };

  constructor() {
    super(logger);
  }

  override inspectResponse(_tx: HttpTransaction): Alert[] {
    throw new Error('boom');
  }

  getExampleAlerts(): Alert[] {
    return [];
  }
}

class RecordingReporter extends BaseReporter {
  readonly calls: string[] = [];

  getFormat(): ReportFormat {
    return ReportFormat.JSON;
  }

  override async onScanStarted(): Promise<void> {
    this.calls.push('started');
  }

  override async onAlert(alert: Alert): Promise<void> {
    this.calls.push(`alert:${alert.ruleId}`);
  }

  override async onScanCompleted(result: ScanResult): Promise<void> {
    this.calls.push(`completed:${result.alerts.length}`);
  }

  override async generate(): Promise<void> {
    this.calls.push('generate');
  }
}

function config(overrides: (c: ScanConfiguration) => void = () => undefined): ScanConfiguration {
  const c = defaultScanConfiguration();
  overrides(c);
  return c;
}

const corsTx = (uri = 'https://api.example.com/data') =>
  createTransaction({ request: { uri }, response: { headers: { 'Access-Control-Allow-Origin': '*' } } });

describe('ScanEngine', () => {
  let registry: DetectorRegistry;

  beforeEach(() => {
    registry = new DetectorRegistry();
    registry.register(new CrossDomainMisconfigurationDetector(logger));
  });

  describe('passive dispatch', () => {
    it('should return alerts and hand them to the sink and listeners', () => {
      const collector = new AlertCollector();
      const engine = new ScanEngine({ registry, config: config(), logger, alertSink: collector.sink });
      const emitted: Alert[] = [];
      engine.on('alertRaised', (alert: Alert) => emitted.push(alert));

      const alerts = engine.inspectResponse(corsTx());

      expect(alerts.map((a) => a.ruleId)).toEqual([10098]);
      expect(collector.byRule(10098)).toEqual(alerts);
      expect(emitted).toEqual(alerts);
    });

    it('should skip disabled rules', () => {
      const engine = new ScanEngine({ registry, config: config((c) => (c.detectors.disabled = [10098])), logger });
      expect(engine.inspectResponse(corsTx())).toEqual([]);
    });

    it('should skip rules missing from the enabled list', () => {
      const engine = new ScanEngine({ registry, config: config((c) => (c.detectors.enabled = [10109])), logger });
      expect(engine.inspectResponse(corsTx())).toEqual([]);
    });

    it('should skip responses that are missing', () => {
      const engine = new ScanEngine({ registry, config: config(), logger });
      expect(engine.inspectResponse(createTransaction({ response: null }))).toEqual([]);
    });

    it('should isolate a throwing detector', () => {
      const isolated = new DetectorRegistry();
      isolated.registerAll([new ThrowingDetector(), new CrossDomainMisconfigurationDetector(logger)]);
      const engine = new ScanEngine({ registry: isolated, config: config(), logger });
      const failures: unknown[] = [];
      engine.on('detectorFailed', (event: unknown) => failures.push(event));

      const alerts = engine.inspectResponse(corsTx());

      expect(alerts).toHaveLength(1);
      expect(failures).toEqual([{ ruleId: 1, uri: 'https://api.example.com/data', error: new Error('boom') }]);
    });

    it('should return every alert on repeated visits without keeping them', () => {
      const engine = new ScanEngine({ registry, config: config(), logger });

      expect(engine.inspectResponse(corsTx())).toHaveLength(1);
      expect(engine.inspectResponse(corsTx())).toHaveLength(1);
      expect(engine.getAlerts()).toEqual([]);
      expect(engine.getErrors()).toEqual([]);
    });

    it('should not blame the detector when the alert sink throws', () => {
      const isolated = new DetectorRegistry();
      isolated.register(new CrossDomainMisconfigurationDetector(logger));
      const engine = new ScanEngine({
        registry: isolated,
        config: config(),
        logger,
        alertSink: () => {
          throw new Error('sink down');
        },
      });
      const failures: unknown[] = [];
      const emitted: Alert[] = [];
      engine.on('detectorFailed', (event: unknown) => failures.push(event));
      engine.on('alertRaised', (alert: Alert) => emitted.push(alert));

      expect(engine.inspectResponse(corsTx())).toHaveLength(1);
      expect(emitted).toHaveLength(1);
      expect(failures).toEqual([]);
    });
  });

  describe('active dispatch', () => {
    const phpPage = () =>
      createTransaction({
        request: { uri: 'https://example.com/index.php' },
        response: { headers: { 'Content-Type': 'text/html' }, body: 'Hello' },
      });
    let transport: RecordingTransport;

    beforeEach(() => {
      registry.register(new SourceCodeDisclosureCve20121823Detector(logger));
      transport = new RecordingTransport(() => ({
        statusCode: 200,
        headers: { 'Content-Type': 'text/html' },
        body: '<?php echo 1; ?>',
      }));
    });

    it('should run applicable active detectors', async () => {
      const engine = new ScanEngine({ registry, config: config(), logger });
      const alerts = await engine.runActive(phpPage(), { send: transport.send, technologies: [Technology.PHP] });

      expect(alerts.map((a) => a.ruleId)).toEqual([20017]);
      expect(transport.requests).toHaveLength(1);
    });

    it('should skip detectors for other technologies', async () => {
      const engine = new ScanEngine({ registry, config: config(), logger });
      const alerts = await engine.runActive(phpPage(), { send: transport.send, technologies: [Technology.NGINX] });

      expect(alerts).toEqual([]);
      expect(transport.requests).toHaveLength(0);
    });

    it('should take technologies from the configuration', async () => {
      const engine = new ScanEngine({
        registry,
        config: config((c) => (c.target.technologies = [Technology.ASP_NET])),
        logger,
      });
      expect(await engine.runActive(phpPage(), { send: transport.send })).toEqual([]);
    });

    it('should skip detectors whose threshold is off', async () => {
      const engine = new ScanEngine({
        registry,
        config: config((c) => (c.detectors.thresholds = { '20017': AlertThreshold.OFF })),
        logger,
      });
      expect(await engine.runActive(phpPage(), { send: transport.send })).toEqual([]);
      expect(transport.requests).toHaveLength(0);
    });

    it('should stop when the scan is cancelled', async () => {
      const controller = new AbortController();
      controller.abort();
      const engine = new ScanEngine({ registry, config: config(), logger });

      expect(await engine.runActive(phpPage(), { send: transport.send, signal: controller.signal })).toEqual([]);
      expect(transport.requests).toHaveLength(0);
    });
  });

  describe('scan', () => {
    it('should scan a batch and drive the reporters', async () => {
      registry.register(new ModernAppDetector(logger));
      const engine = new ScanEngine({ registry, config: config(), logger });
      const reporter = new RecordingReporter();
      engine.registerReporter(reporter);

      const page = createTransaction({
        request: { uri: 'https://api.example.com/' },
        response: { headers: { 'Content-Type': 'text/html' }, body: '<html><body><a href="#">x</a></body></html>' },
      });
      const result = await engine.scan([corsTx(), page]);

      expect(result.status).toBe(ScanStatus.COMPLETED);
      expect(result.transactionsScanned).toBe(2);
      expect(result.targetName).toBe('https://api.example.com');
      expect(result.summary).toEqual({ total: 2, high: 0, medium: 1, low: 0, info: 1 });
      expect(reporter.calls).toEqual(['started', 'alert:10098', 'alert:10109', 'completed:2', 'generate']);
      expect(engine.getStatus()).toBe(ScanStatus.COMPLETED);
    });

    it('should drop duplicate alerts within a batch', async () => {
      const engine = new ScanEngine({ registry, config: config(), logger });
      engine.registerReporter(new RecordingReporter());

      const result = await engine.scan([corsTx(), corsTx(), corsTx('https://api.example.com/other')]);

      expect(result.alerts.map((a) => a.uri)).toEqual(['https://api.example.com/data', 'https://api.example.com/other']);
      expect(engine.getAlerts()).toHaveLength(2);
    });

    it('should start each batch without the previous alerts', async () => {
      const engine = new ScanEngine({ registry, config: config(), logger });
      engine.registerReporter(new RecordingReporter());

      await engine.scan([corsTx()]);
      const second = await engine.scan([corsTx()]);

      expect(second.alerts).toHaveLength(1);
    });

    it('should keep duplicates when deduplication is off', async () => {
      const engine = new ScanEngine({
        registry,
        config: config((c) => (c.advanced.deduplicateAlerts = false)),
        logger,
      });
      engine.registerReporter(new RecordingReporter());

      expect((await engine.scan([corsTx(), corsTx()])).alerts).toHaveLength(2);
    });

    it('should record detector failures in the result', async () => {
      const isolated = new DetectorRegistry();
      isolated.register(new ThrowingDetector());
      const engine = new ScanEngine({ registry: isolated, config: config(), logger });
      engine.registerReporter(new RecordingReporter());

      const result = await engine.scan([corsTx()]);

      expect(result.errors).toEqual([{ ruleId: 1, message: 'boom', uri: 'https://api.example.com/data' }]);
      expect(engine.getErrors()).toEqual(result.errors);
    });

    it('should prefer an explicit target name', async () => {
      const engine = new ScanEngine({ registry, config: config(), logger });
      engine.registerReporter(new RecordingReporter());
      expect((await engine.scan([], 'staging')).targetName).toBe('staging');
    });
  });
});
