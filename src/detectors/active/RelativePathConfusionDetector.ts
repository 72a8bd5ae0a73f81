import { randomInt } from 'node:crypto';
import { mergeTags, OwaspTags, PolicyTags } from '../../core/alerts/alert-tags';
import { HeaderNames } from '../../core/http/HttpHeaders';
import { HttpRequest, HttpTransaction } from '../../core/http/HttpMessage';
import { ActiveScanContext, BaseActiveDetector } from '../../core/interfaces/IActiveDetector';
import { DetectorMetadata } from '../../core/interfaces/IDetector';
import { Alert } from '../../types/alert';
import { ConfidenceLevel, DetectorCategory, RiskLevel } from '../../types/enums';
import { HtmlDocument } from '../../utils/html/HtmlDocument';
import { globalLogger, Logger } from '../../utils/logger/Logger';
import {
  ANY_ELEMENT,
  ELEMENT_BODY,
  isRelativeReference,
  QUIRKS_MODE_DOCTYPE_PUBLIC_IDS,
  RELATIVE_LOADING_ATTRIBUTES,
  STYLE_RELATIVE_URL_PATTERN,
} from '../../utils/patterns/relative-path-patterns';

const METADATA: DetectorMetadata = Object.freeze({
  id: 10051,
  name: 'Relative Path Confusion',
  description:
    'The web server is configured to serve responses to ambiguous URLs in a manner that is likely ' +
    'to lead to confusion about the correct "relative path" for the URL. Resources (CSS, images, ' +
    'etc.) are also specified in the page response using relative, rather than absolute URLs. In ' +
    'an attack, if the web browser parses the "cross-content" response in a permissive manner, or ' +
    'can be tricked into permissively parsing the "cross-content" response, using techniques such ' +
    'as framing, then the web browser may be fooled into interpreting HTML as CSS (or other content ' +
    'types), leading to an XSS vulnerability.',
  solution:
    'Web servers and frameworks should be updated to be configured to not serve responses to ' +
    'ambiguous URLs in such a way that the relative path of such URLs could be mis-interpreted by ' +
    'components on either the client side, or server side. Within the application, the correct use ' +
    'of the "<base>" HTML tag in the HTTP response will unambiguously specify the base URL for all ' +
    'relative URLs in the document. Use the "Content-Type" HTTP response header to make it harder ' +
    'for the attacker to force the web browser to mis-interpret the content type of the response. ' +
    'Use the "X-Content-Type-Options: nosniff" HTTP response header to prevent the web browser from ' +
    '"sniffing" the content type of the response. Use a modern DOCTYPE such as "<!doctype html>" to ' +
    'prevent the page from being rendered in the web browser using "Quirks Mode", since this ' +
    'results in the content type being ignored by the web browser. Specify the "X-Frame-Options" ' +
    'HTTP response header to prevent Quirks Mode from being enabled in the web browser using ' +
    'framing attacks.',
  references: [
    'https://arxiv.org/abs/1811.00917',
    'https://hsivonen.fi/doctype/',
    'https://www.w3schools.com/tags/tag_base.asp',
  ],
  category: DetectorCategory.SERVER,
  risk: RiskLevel.MEDIUM,
  confidence: ConfidenceLevel.MEDIUM,
  cweId: 20,
  wascId: 20,
  tags: mergeTags(OwaspTags.OWASP_2021_A05, OwaspTags.OWASP_2017_A06, PolicyTags.QA_FULL, PolicyTags.PENTEST),
});

export const RelativePathNotes = Object.freeze({
  NO_BASE_TAG: 'There is no <base> tag to specify the base for relative URLs.',
  MULTIPLE_BASE_TAGS: 'There is more than one <base> tag, which is invalid HTML.',
  NO_CONTENT_TYPE: 'No Content-Type was specified, so Quirks Mode is not required to exploit the vulnerability in the web browser.',
  NO_DOCTYPE: 'Quirks Mode is implicitly enabled via the absence of a doctype.',
  FRAMING_ALLOWED: 'A framing attack is possible, since "X-Frame-Options" is not set.',
  contentType: (contentType: string) =>
    `A Content-Type of ${contentType} was specified. If the web browser is using strict parsing rules, this will prevent cross-content attacks from succeeding. Quirks Mode in the web browser would disable strict parsing.`,
  quirksExplicit: (httpEquiv: string) =>
    `Quirks Mode is explicitly enabled via <meta http-equiv="${httpEquiv}">, which allows the specified Content Type to be bypassed.`,
  quirksDoctype: (publicId: string) =>
    `Quirks Mode is implicitly enabled via the use of old doctype ${publicId}, which allows the specified Content Type to be bypassed.`,
});

const ATTACK_PATH_CHARS = 'abcdefghijklmnopqrstuvwxyz0123456789';

function randomSegment(length: number): string {
  let segment = '';
  for (let i = 0; i < length; i++) {
    segment += ATTACK_PATH_CHARS[randomInt(ATTACK_PATH_CHARS.length)];
  }
  return segment;
}

/**
 * Appends a fake path below a file URL and checks whether the page served there still loads
 * resources through relative references a browser could resolve against the fake path.
 */
export class RelativePathConfusionDetector extends BaseActiveDetector {
  readonly metadata = METADATA;

  /** Drawn once so repeated scans of the same URL send the same attack */
  readonly attackPath: string;

  constructor(logger: Logger = globalLogger, attackPath = `/${randomSegment(5)}/${randomSegment(5)}`) {
    super(logger.child('RelativePathConfusion'));
    this.attackPath = attackPath;
  }

  async scan(base: HttpTransaction, context: ActiveScanContext): Promise<Alert[]> {
    const baseUrl = base.request.url;
    this.logger.debug(`Checking [${base.method}] [${base.uri}] for Relative Path Confusion issues`);
    if (!baseUrl || !hasFileExtension(baseUrl.pathname)) {
      this.logger.debug(`The URI ${base.uri} has no filename extension, skipping`);
      return [];
    }

    const attackUri = this.buildAttackUri(baseUrl);
    let headers: Record<string, string> = {};
    const cookie = base.request.headers.get(HeaderNames.COOKIE);
    if (cookie !== undefined) {
      headers = { [HeaderNames.COOKIE]: cookie };
    }
    const request = new HttpRequest({ method: 'GET', uri: attackUri, version: base.request.version, headers });

    const attacked = await this.sendAndReceive(context, request, true);
    const response = attacked?.response;
    if (!response) {
      return [];
    }

    const document = HtmlDocument.parse(response.bodyText());
    const notes: string[] = [];

    const baseTags = document.findByPath(['html', 'head', 'base']).filter((e) => 'href' in e.attributes);
    if (baseTags.length === 1) {
      this.logger.debug('A single <base> is present, relative paths are unambiguous');
      return [];
    }
    notes.push(baseTags.length > 1 ? RelativePathNotes.MULTIPLE_BASE_TAGS : RelativePathNotes.NO_BASE_TAG);

    const evidence = findRelativeReference(document);
    if (evidence === null) {
      this.logger.debug('No relative references found, so there is no possibility for confusion');
      return [];
    }

    const contentType = response.contentType;
    if (contentType === undefined || !contentType.trim()) {
      notes.push(RelativePathNotes.NO_CONTENT_TYPE);
    } else {
      notes.push(RelativePathNotes.contentType(contentType));
      const quirks = quirksModeNotes(document);
      notes.push(...quirks);

      let framingPossible = false;
      if (quirks.length === 0) {
        const frameOptions = response.headers.get(HeaderNames.X_FRAME_OPTIONS);
        if (frameOptions === undefined) {
          framingPossible = true;
          notes.push(RelativePathNotes.FRAMING_ALLOWED);
        }
      }

      if (quirks.length === 0 && !framingPossible) {
        this.logger.debug('Quirks mode is off and the page cannot be framed');
        return [];
      }
    }

    this.logger.debug(`A Relative Path Confusion issue exists on ${base.uri}`);
    return [
      this.newAlert(base).setAttack(attackUri).setOtherInfo(notes.join('\n')).setEvidence(evidence).build(),
    ];
  }

  getExampleAlerts(): Alert[] {
    return [
      this.newAlert()
        .setAttack('https://example.com/profile.php/ybpsv/bqmmn?foo=bar')
        .setOtherInfo(RelativePathNotes.NO_CONTENT_TYPE)
        .setEvidence('background: url(image.png)')
        .build(),
    ];
  }

  private buildAttackUri(url: URL): string {
    const query = url.search.length > 1 ? url.search : '';
    return `${url.protocol}//${url.host}${url.pathname}${this.attackPath}${query}`;
  }
}

function hasFileExtension(pathname: string): boolean {
  const name = pathname.substring(pathname.lastIndexOf('/') + 1);
  const dot = name.lastIndexOf('.');
  return dot !== -1 && dot < name.length - 1;
}

/**
 * Evidence for the first relative reference, or null when there is none
 */
function findRelativeReference(document: HtmlDocument): string | null {
  for (const [attribute, tags] of RELATIVE_LOADING_ATTRIBUTES) {
    for (const tag of tags) {
      const candidates = tag === ANY_ELEMENT ? document.elements : document.getElementsByName(tag);

      for (const element of candidates) {
        if (attribute === ELEMENT_BODY) {
          const match = STYLE_RELATIVE_URL_PATTERN.exec(element.text);
          if (match) return match[0];
          continue;
        }

        const value = element.attributes[attribute];
        if (value === undefined) continue;

        if (attribute === 'style') {
          const match = STYLE_RELATIVE_URL_PATTERN.exec(value);
          if (match) return match[0];
        } else if (isRelativeReference(value)) {
          return document.getSourceMarkup(element);
        }
      }
    }
  }
  return null;
}

function quirksModeNotes(document: HtmlDocument): string[] {
  const notes: string[] = [];
  for (const meta of document.findByPath(['html', 'head', 'meta'])) {
    const httpEquiv = meta.attributes['http-equiv'];
    if (httpEquiv === undefined) continue;
    const content = meta.attributes['content'] ?? '';
    if (httpEquiv.trim().toUpperCase() === 'X-UA-COMPATIBLE' && content.trim().toUpperCase() !== 'IE=EDGE') {
      notes.push(RelativePathNotes.quirksExplicit(httpEquiv));
    }
  }
  if (notes.length > 0) {
    return notes;
  }

  const doctype = document.doctype;
  if (!doctype) {
    return [RelativePathNotes.NO_DOCTYPE];
  }
  const publicId = doctype.publicId.toUpperCase();
  if (QUIRKS_MODE_DOCTYPE_PUBLIC_IDS.some((id) => id.toUpperCase() === publicId)) {
    return [RelativePathNotes.quirksDoctype(doctype.publicId)];
  }
  return [];
}
