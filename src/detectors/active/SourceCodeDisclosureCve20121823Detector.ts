import { decodeHTML } from 'entities';
import { mergeTags, OwaspTags, PolicyTags } from '../../core/alerts/alert-tags';
import { HttpRequest, HttpResponse, HttpTransaction } from '../../core/http/HttpMessage';
import { ActiveScanContext, BaseActiveDetector } from '../../core/interfaces/IActiveDetector';
import { DetectorMetadata } from '../../core/interfaces/IDetector';
import { Alert } from '../../types/alert';
import {
  AlertThreshold,
  AttackStrength,
  ConfidenceLevel,
  DetectorCategory,
  isStrengthAtLeast,
  RiskLevel,
  Technology,
} from '../../types/enums';
import { globalLogger, Logger } from '../../utils/logger/Logger';

const METADATA: DetectorMetadata = Object.freeze({
  id: 20017,
  name: 'Source Code Disclosure - CVE-2012-1823',
  description:
    'Some PHP versions, when configured to run using CGI, do not correctly handle query strings ' +
    'that lack an unescaped "=" character, enabling PHP source code disclosure, and arbitrary ' +
    'code execution. In this case, the contents of the PHP file were served directly to the web ' +
    'browser. This output will typically contain PHP, although it may also contain straight HTML.',
  solution:
    'Upgrade to the latest stable version of PHP, or use the Apache web server and the ' +
    'mod_rewrite module to filter out malicious requests using the "RewriteCond" and ' +
    '"RewriteRule" directives.',
  references: [
    'https://www.cve.org/CVERecord?id=CVE-2012-1823',
    'https://www.kb.cert.org/vuls/id/520827',
  ],
  category: DetectorCategory.INFO_GATHER,
  risk: RiskLevel.HIGH,
  confidence: ConfidenceLevel.MEDIUM,
  cweId: 20,
  wascId: 20,
  tags: mergeTags(
    OwaspTags.OWASP_2021_A06,
    OwaspTags.OWASP_2017_A09,
    { 'CVE-2012-1823': 'https://www.cve.org/CVERecord?id=CVE-2012-1823' },
    PolicyTags.QA_FULL,
    PolicyTags.PENTEST
  ),
  technologies: [Technology.PHP],
});

/** Query that makes a vulnerable php-cgi print the script source */
export const SOURCE_DISCLOSURE_QUERY = '-s';

const PHP_SOURCE_PATTERNS: readonly RegExp[] = Object.freeze([/<\?php.+?\?>/s, /<\?=.+?\?>/s]);

/**
 * Asks a php-cgi target to print its own source through the `-s` command line switch
 */
export class SourceCodeDisclosureCve20121823Detector extends BaseActiveDetector {
  readonly metadata = METADATA;

  constructor(logger: Logger = globalLogger) {
    super(logger.child('SourceCodeDisclosureCve20121823'));
  }

  async scan(base: HttpTransaction, context: ActiveScanContext): Promise<Alert[]> {
    const baseResponse = base.response;
    if (baseResponse && !this.shouldAttack(baseResponse, context.strength)) {
      return [];
    }

    const url = base.request.url;
    if (!url) return [];
    url.search = `?${SOURCE_DISCLOSURE_QUERY}`;
    url.hash = '';

    const request = new HttpRequest({
      method: base.request.method,
      uri: url.toString(),
      version: base.request.version,
      headers: base.request.headers,
      body: base.request.body,
    });
    const attacked = await this.sendAndReceive(context, request, false);
    const response = attacked?.response;
    if (!response || !response.isSuccess) {
      return [];
    }
    if (response.isJavaScript && context.threshold !== AlertThreshold.LOW) {
      this.logger.debug(`Ignoring JavaScript response from ${request.uri} above the Low threshold`);
      return [];
    }

    const source = findPhpSource(decodeHTML(response.bodyText()));
    if (source === null) {
      return [];
    }

    this.logger.debug(`PHP source disclosed by ${request.uri}`);
    return [this.newAlert(base).setOtherInfo(source).build()];
  }

  getExampleAlerts(): Alert[] {
    return [this.newAlert().setOtherInfo("<?php echo 'example'; ?>").build()];
  }

  private shouldAttack(response: HttpResponse, strength: AttackStrength): boolean {
    if (!response.isText) {
      this.logger.debug('Ignoring non text response');
      return false;
    }
    if (response.statusCode === 404 && !isStrengthAtLeast(strength, AttackStrength.HIGH)) {
      this.logger.debug('Ignoring 404 response below High strength');
      return false;
    }
    const body = response.bodyText();
    if (isBinary(body)) {
      this.logger.debug('Ignoring binary response');
      return false;
    }
    if (findPhpSource(decodeHTML(body)) !== null) {
      this.logger.debug('Response already contains PHP source, skipping');
      return false;
    }
    return true;
  }
}

function findPhpSource(text: string): string | null {
  for (const pattern of PHP_SOURCE_PATTERNS) {
    const match = pattern.exec(text);
    if (match) return match[0];
  }
  return null;
}

/**
 * Control characters other than tab and line breaks, or the replacement character
 * left by a failed UTF-8 decode
 */
function isBinary(text: string): boolean {
  return /[\u0000-\u0008\u000b\u000c\u000e-\u001f\ufffd]/.test(text);
}
