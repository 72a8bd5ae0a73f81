import { mergeTags, OwaspTags, PolicyTags } from '../../core/alerts/alert-tags';
import { HeaderNames } from '../../core/http/HttpHeaders';
import { HttpTransaction } from '../../core/http/HttpMessage';
import { DetectorMetadata } from '../../core/interfaces/IDetector';
import { BasePassiveDetector } from '../../core/interfaces/IPassiveDetector';
import { Alert } from '../../types/alert';
import { ConfidenceLevel, DetectorCategory, RiskLevel } from '../../types/enums';
import { globalLogger, Logger } from '../../utils/logger/Logger';

const METADATA: DetectorMetadata = Object.freeze({
  id: 10098,
  name: 'Cross-Domain Misconfiguration',
  description:
    'Web browser data loading may be possible, due to a Cross Origin Resource Sharing (CORS) ' +
    'misconfiguration on the web server.',
  solution:
    'Ensure that sensitive data is not available in an unauthenticated manner ' +
    '(using IP address white-listing, for instance). Configure the "Access-Control-Allow-Origin" ' +
    'HTTP header to a more restrictive set of domains, or remove all CORS headers entirely, to ' +
    'allow the web browser to enforce the Same Origin Policy (SOP) in a more restrictive manner.',
  references: [
    'https://vulncat.fortify.com/en/detail?id=desc.config.dotnet.html5_overly_permissive_cors_policy',
  ],
  category: DetectorCategory.MISC,
  risk: RiskLevel.MEDIUM,
  confidence: ConfidenceLevel.MEDIUM,
  cweId: 264,
  wascId: 14,
  tags: mergeTags(OwaspTags.OWASP_2021_A01, OwaspTags.OWASP_2017_A05, PolicyTags.PENTEST, PolicyTags.QA_STD),
});

const OTHER_INFO =
  'The CORS misconfiguration on the web server permits cross-domain read requests from ' +
  'arbitrary third party domains, using unauthenticated APIs on this domain. Web browser ' +
  'implementations do not permit arbitrary third parties to read the response from ' +
  'authenticated APIs, however. This reduces the risk somewhat. This misconfiguration could ' +
  'be used by an attacker to access data that is available in an unauthenticated manner, but ' +
  'which uses some other form of security, such as IP address white-listing.';

/**
 * Flags responses that allow any origin to read them through CORS.
 * `Access-Control-Allow-Credentials` is not taken into account.
 */
export class CrossDomainMisconfigurationDetector extends BasePassiveDetector {
  readonly metadata = METADATA;

  constructor(logger: Logger = globalLogger) {
    super(logger.child('CrossDomainMisconfiguration'));
  }

  override inspectResponse(tx: HttpTransaction): Alert[] {
    const response = tx.response;
    if (!response) return [];

    this.logger.debug(`Checking ${tx.uri} for Cross-Domain misconfigurations`);
    const allowOrigin = response.headers.get(HeaderNames.ACCESS_CONTROL_ALLOW_ORIGIN);
    if (allowOrigin === undefined || allowOrigin.trim() !== '*') {
      return [];
    }

    this.logger.debug(`Raising a Medium risk Cross Domain alert on ${tx.uri}`);
    const evidence = extractHeaderLine(response.headerBlock, HeaderNames.ACCESS_CONTROL_ALLOW_ORIGIN);
    return [this.buildAlert(tx, evidence)];
  }

  getExampleAlerts(): Alert[] {
    return [this.buildAlert(undefined, 'access-control-allow-origin: *')];
  }

  private buildAlert(tx: HttpTransaction | undefined, evidence: string): Alert {
    return this.newAlert(tx).setOtherInfo(OTHER_INFO).setEvidence(evidence).build();
  }
}

/**
 * Header line as written in the block, from the name up to the line end.
 * Only matches the name at the start of a line, never inside another header's value.
 */
export function extractHeaderLine(headerBlock: string, headerName: string): string {
  const found = headerBlock.toLowerCase().indexOf(`\n${headerName.toLowerCase()}:`);
  if (found === -1) return '';
  const start = found + 1;
  const end = headerBlock.indexOf('\n', start);
  return headerBlock.substring(start, end === -1 ? undefined : end).replace(/\r$/, '');
}
