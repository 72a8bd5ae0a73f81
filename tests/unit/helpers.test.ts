import { CrossDomainMisconfigurationDetector } from '../../src/detectors/passive/CrossDomainMisconfigurationDetector';
import { assertNoAlerts, createMemoryLogger, createTransaction, RecordingTransport } from '../../src/testing/helpers';
import { HttpRequest } from '../../src/core/http/HttpMessage';
import { RiskLevel } from '../../src/types/enums';

describe('testing helpers', () => {
  const alerts = new CrossDomainMisconfigurationDetector(createMemoryLogger()).inspectResponse(
    createTransaction({ response: { headers: { 'Access-Control-Allow-Origin': '*' } } })
  );

  it('should pass when every alert is within the allowed risk', () => {
    expect(() => assertNoAlerts(alerts, RiskLevel.MEDIUM)).not.toThrow();
  });

  it('should list the alerts above the allowed risk', () => {
    expect(() => assertNoAlerts(alerts)).toThrow(
      'Alerts found above info risk:\n  - [MEDIUM] 10098 Cross-Domain Misconfiguration on https://example.com/\n\nTotal: 1 alert(s)'
    );
  });

  it('should reject sends the responder refuses', async () => {
    const transport = new RecordingTransport(() => null);
    await expect(transport.send(new HttpRequest({ uri: 'https://example.com/x' }), true)).rejects.toThrow(
      'connection refused: https://example.com/x'
    );
    expect(transport.redirectFlags).toEqual([true]);
  });
});
