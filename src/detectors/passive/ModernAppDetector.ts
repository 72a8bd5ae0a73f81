import { mergeTags, PolicyTags } from '../../core/alerts/alert-tags';
import { HttpTransaction } from '../../core/http/HttpMessage';
import { DetectorMetadata } from '../../core/interfaces/IDetector';
import { BasePassiveDetector } from '../../core/interfaces/IPassiveDetector';
import { Alert } from '../../types/alert';
import { ConfidenceLevel, DetectorCategory, RiskLevel } from '../../types/enums';
import { HtmlDocument, HtmlElement } from '../../utils/html/HtmlDocument';
import { globalLogger, Logger } from '../../utils/logger/Logger';

const METADATA: DetectorMetadata = Object.freeze({
  id: 10109,
  name: 'Modern Web Application',
  description:
    'The application appears to be a modern web application. If you need to explore it ' +
    'automatically then an AJAX spider or a browser driven crawler may well be more effective ' +
    'than a traditional one.',
  solution: 'This is an informational alert and so no changes are required.',
  references: [],
  category: DetectorCategory.INFO_GATHER,
  risk: RiskLevel.INFO,
  confidence: ConfidenceLevel.MEDIUM,
  cweId: 0,
  wascId: 0,
  tags: mergeTags(PolicyTags.PENTEST, PolicyTags.DEV_STD, PolicyTags.QA_STD),
});

export const ModernAppReasons = Object.freeze({
  NO_LINKS: 'No links have been found while there are scripts, which is an indication that this is a modern web application.',
  SELF_LINKS:
    'Links have been found that do not have traditional href attributes, which is an indication that this is a modern web application.',
  NOSCRIPT:
    'A noscript tag has been found, which is an indication that the application works differently with JavaScript enabled compared to when it is not.',
} as const);

interface Finding {
  readonly element: HtmlElement;
  readonly reason: string;
}

/**
 * Informational detector for single page style applications
 */
export class ModernAppDetector extends BasePassiveDetector {
  readonly metadata = METADATA;

  constructor(logger: Logger = globalLogger) {
    super(logger.child('ModernApp'));
  }

  override inspectResponse(tx: HttpTransaction): Alert[] {
    const response = tx.response;
    if (!response || !response.isHtml) {
      return [];
    }

    const document = HtmlDocument.parse(response.bodyText());
    const finding = findIndicator(document);
    if (!finding) {
      return [];
    }

    return [
      this.newAlert(tx)
        .setEvidence(document.getSourceMarkup(finding.element))
        .setOtherInfo(finding.reason)
        .build(),
    ];
  }

  getExampleAlerts(): Alert[] {
    return [this.newAlert().setEvidence('<a href="#">Link</a>').setOtherInfo(ModernAppReasons.SELF_LINKS).build()];
  }
}

function findIndicator(document: HtmlDocument): Finding | null {
  const links = document.getElementsByName('a');

  if (links.length === 0) {
    const [script] = document.getElementsByName('script');
    if (script) {
      return { element: script, reason: ModernAppReasons.NO_LINKS };
    }
  } else {
    const link = links.find((a) => {
      const href = a.attributes['href'];
      return !href || href === '#' || a.attributes['target'] === '_self';
    });
    if (link) {
      return { element: link, reason: ModernAppReasons.SELF_LINKS };
    }
  }

  const [noscript] = document.getElementsByName('noscript');
  return noscript ? { element: noscript, reason: ModernAppReasons.NOSCRIPT } : null;
}
