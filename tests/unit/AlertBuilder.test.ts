import { AlertBuilder } from '../../src/core/alerts/AlertBuilder';
import { OwaspTags, PolicyTags, mergeTags } from '../../src/core/alerts/alert-tags';
import { ConfidenceLevel, DetectorType, RiskLevel } from '../../src/types/enums';

describe('AlertBuilder', () => {
  it('should fill defaults', () => {
    const alert = new AlertBuilder(10098, 'Cross-Domain Misconfiguration', DetectorType.PASSIVE).build();

    expect(alert.ruleId).toBe(10098);
    expect(alert.detectorType).toBe(DetectorType.PASSIVE);
    expect(alert.risk).toBe(RiskLevel.INFO);
    expect(alert.confidence).toBe(ConfidenceLevel.MEDIUM);
    expect(alert.evidence).toBe('');
    expect(alert.cweId).toBe(0);
    expect(alert.references).toEqual([]);
    expect(alert.tags).toEqual({});
  });

  it('should set every field through the fluent API', () => {
    const alert = new AlertBuilder(1, 'Rule', DetectorType.ACTIVE)
      .setRisk(RiskLevel.HIGH)
      .setConfidence(ConfidenceLevel.LOW)
      .setDescription('desc')
      .setSolution('fix')
      .setReferences(['https://example.com/ref'])
      .setEvidence('ev')
      .setOtherInfo('other')
      .setAttack('atk')
      .setParam('p')
      .setMethod('POST')
      .setUri('https://example.com/a')
      .setCweId(20)
      .setWascId(13)
      .setTags(PolicyTags.PENTEST)
      .build();

    expect(alert).toMatchObject({
      risk: RiskLevel.HIGH,
      confidence: ConfidenceLevel.LOW,
      description: 'desc',
      solution: 'fix',
      references: ['https://example.com/ref'],
      evidence: 'ev',
      otherInfo: 'other',
      attack: 'atk',
      param: 'p',
      method: 'POST',
      uri: 'https://example.com/a',
      cweId: 20,
      wascId: 13,
      tags: { PENTEST: '' },
    });
  });

  it('should produce frozen alerts with distinct ids', () => {
    const builder = new AlertBuilder(1, 'Rule', DetectorType.PASSIVE).setReferences(['a']);
    const first = builder.build();
    const second = builder.build();

    expect(first.id).not.toBe(second.id);
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first.references)).toBe(true);
    expect(Object.isFrozen(first.tags)).toBe(true);
  });

  it('should not let later builder changes leak into built alerts', () => {
    const builder = new AlertBuilder(1, 'Rule', DetectorType.PASSIVE).setEvidence('before');
    const alert = builder.build();
    builder.setEvidence('after');
    expect(alert.evidence).toBe('before');
  });
});

describe('mergeTags', () => {
  it('should combine tag maps with later entries winning', () => {
    const tags = mergeTags(OwaspTags.OWASP_2021_A01, PolicyTags.QA_STD, { QA_STD: 'override' });
    expect(tags).toEqual({
      OWASP_2021_A01: 'https://owasp.org/Top10/A01_2021-Broken_Access_Control/',
      QA_STD: 'override',
    });
    expect(Object.isFrozen(tags)).toBe(true);
  });
});
