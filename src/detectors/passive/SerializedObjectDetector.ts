import { mergeTags, OwaspTags, PolicyTags } from '../../core/alerts/alert-tags';
import { HeaderNames } from '../../core/http/HttpHeaders';
import { HttpTransaction } from '../../core/http/HttpMessage';
import { DetectorMetadata } from '../../core/interfaces/IDetector';
import { BasePassiveDetector } from '../../core/interfaces/IPassiveDetector';
import { Alert } from '../../types/alert';
import { ConfidenceLevel, DetectorCategory, RiskLevel } from '../../types/enums';
import { decodeBase64, percentDecodeBytes, percentDecodeUtf8, startsWithBytes } from '../../utils/encoding/decoders';
import { globalLogger, Logger } from '../../utils/logger/Logger';

/** Stream header of a serialized Java object: STREAM_MAGIC then STREAM_VERSION */
export const JAVA_SERIALIZATION_MAGIC = Buffer.from([0xac, 0xed, 0x00, 0x05]);

const METADATA: DetectorMetadata = Object.freeze({
  id: 90002,
  name: 'Java Serialization Object',
  description:
    'Java Serialization seems to be in use. If not correctly validated, an attacker can send a ' +
    'specially crafted object. This can lead to a dangerous "Remote Code Execution". A magic ' +
    'sequence identifying JSO has been detected (Base64: rO0AB, Raw: 0xac, 0xed, 0x00, 0x05).',
  solution:
    'Deserialization of untrusted data is inherently dangerous and should be avoided.',
  references: [
    'https://www.oracle.com/java/technologies/javase/seccodeguide.html#8',
  ],
  category: DetectorCategory.MISC,
  risk: RiskLevel.MEDIUM,
  confidence: ConfidenceLevel.HIGH,
  cweId: 502,
  wascId: 20,
  tags: mergeTags(OwaspTags.OWASP_2021_A04, OwaspTags.OWASP_2017_A08, PolicyTags.PENTEST),
});

type Channel = 'request header' | 'request cookie' | 'URL parameter' | 'request body'
  | 'response header' | 'response cookie' | 'response body';

interface Candidate {
  readonly channel: Channel;
  readonly name: string;
  /** Text form of the value, quoted as evidence */
  readonly text: string;
  /** Raw bytes, only for bodies */
  readonly bytes?: Buffer;
}

type Encoding = 'raw' | 'base64' | 'URL encoded';

interface Match {
  readonly candidate: Candidate;
  readonly encoding: Encoding;
}

/**
 * Looks for the Java serialization stream header in headers, cookies, parameters and bodies,
 * raw or wrapped in base64 or percent-encoding.
 */
export class SerializedObjectDetector extends BasePassiveDetector {
  readonly metadata = METADATA;

  constructor(logger: Logger = globalLogger) {
    super(logger.child('SerializedObject'));
  }

  override inspectRequest(tx: HttpTransaction): Alert[] {
    const request = tx.request;
    const candidates: Candidate[] = [
      ...request.headers
        .without(HeaderNames.COOKIE)
        .entries()
        .map((h): Candidate => ({ channel: 'request header', name: h.name, text: h.value })),
      ...request
        .getCookies()
        .map((c): Candidate => ({ channel: 'request cookie', name: c.name, text: c.value })),
      ...request
        .getUrlParams()
        .map((p): Candidate => ({ channel: 'URL parameter', name: p.name, text: p.value })),
      bodyCandidate('request body', request.body),
    ];
    return this.firstMatch(tx, candidates);
  }

  override inspectResponse(tx: HttpTransaction): Alert[] {
    const response = tx.response;
    if (!response) return [];

    const candidates: Candidate[] = [
      ...response.headers
        .without(HeaderNames.SET_COOKIE)
        .entries()
        .map((h): Candidate => ({ channel: 'response header', name: h.name, text: h.value })),
      ...response
        .getCookies()
        .map((c): Candidate => ({ channel: 'response cookie', name: c.name, text: c.value })),
      bodyCandidate('response body', response.body),
    ];
    return this.firstMatch(tx, candidates);
  }

  getExampleAlerts(): Alert[] {
    return [this.newAlert().setOtherInfo('Found in response header X-Payload (base64)').build()];
  }

  private firstMatch(tx: HttpTransaction, candidates: readonly Candidate[]): Alert[] {
    for (const candidate of candidates) {
      const encoding = detectEncoding(candidate);
      if (encoding) {
        return [this.buildAlert(tx, { candidate, encoding })];
      }
    }
    return [];
  }

  private buildAlert(tx: HttpTransaction, match: Match): Alert {
    const { candidate, encoding } = match;
    const isBody = candidate.bytes !== undefined;
    this.logger.debug(`Serialized object found in ${candidate.channel} of ${tx.uri}`);

    return this.newAlert(tx)
      .setParam(candidate.name)
      .setEvidence(isBody ? '' : candidate.text)
      .setOtherInfo(
        isBody
          ? `Found in ${candidate.channel} (${encoding})`
          : `Found in ${candidate.channel} ${candidate.name} (${encoding})`
      )
      .build();
  }
}

function bodyCandidate(channel: Channel, body: Buffer): Candidate {
  return { channel, name: '', text: body.toString('latin1'), bytes: body };
}

/**
 * First encoding under which the candidate starts with the magic bytes
 */
function detectEncoding(candidate: Candidate): Encoding | null {
  const raw = candidate.bytes ?? Buffer.from(candidate.text, 'latin1');
  if (startsWithBytes(raw, JAVA_SERIALIZATION_MAGIC)) {
    return 'raw';
  }

  const text = candidate.text.trim();
  const base64 = decodeBase64(text);
  if (base64 && startsWithBytes(base64, JAVA_SERIALIZATION_MAGIC)) {
    return 'base64';
  }

  const percentBytes = percentDecodeBytes(text);
  if (percentBytes && startsWithBytes(percentBytes, JAVA_SERIALIZATION_MAGIC)) {
    return 'URL encoded';
  }
  const percentUtf8 = percentDecodeUtf8(text);
  if (percentUtf8 && startsWithBytes(percentUtf8, JAVA_SERIALIZATION_MAGIC)) {
    return 'URL encoded';
  }
  return null;
}
