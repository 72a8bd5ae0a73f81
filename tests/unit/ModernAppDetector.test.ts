import { ModernAppDetector, ModernAppReasons } from '../../src/detectors/passive/ModernAppDetector';
import { createMemoryLogger, createTransaction } from '../../src/testing/helpers';
import { RiskLevel } from '../../src/types/enums';

const html = (body: string, contentType = 'text/html; charset=utf-8') =>
  createTransaction({
    request: { uri: 'https://app.example.com/' },
    response: { headers: { 'Content-Type': contentType }, body },
  });

describe('ModernAppDetector', () => {
  const detector = new ModernAppDetector(createMemoryLogger());

  it('should flag scripts on a page without links', () => {
    const tx = html(
      '<html><head><script src="app.js"></script></head><body><div id="root"></div></body></html>'
    );
    const [alert] = detector.inspectResponse(tx);

    expect(alert.ruleId).toBe(10109);
    expect(alert.risk).toBe(RiskLevel.INFO);
    expect(alert.evidence).toBe('<script src="app.js"></script>');
    expect(alert.otherInfo).toBe(ModernAppReasons.NO_LINKS);
  });

  it('should flag the first link pointing at #', () => {
    const tx = html('<html><body><a href="/home">Home</a><a href="#">Menu</a></body></html>');
    const [alert] = detector.inspectResponse(tx);

    expect(alert.evidence).toBe('<a href="#">Menu</a>');
    expect(alert.otherInfo).toBe(ModernAppReasons.SELF_LINKS);
  });

  it('should flag links with an empty href', () => {
    const tx = html('<html><body><a href="">Empty</a></body></html>');
    expect(detector.inspectResponse(tx)[0].evidence).toBe('<a href="">Empty</a>');
  });

  it('should flag links targeting _self', () => {
    const tx = html('<html><body><a href="/x" target="_self">X</a></body></html>');
    expect(detector.inspectResponse(tx)[0].evidence).toBe('<a href="/x" target="_self">X</a>');
  });

  it('should fall back to a noscript element', () => {
    const tx = html('<html><body><a href="/a">A</a><noscript>Enable JavaScript</noscript></body></html>');
    const [alert] = detector.inspectResponse(tx);

    expect(alert.evidence).toBe('<noscript>Enable JavaScript</noscript>');
    expect(alert.otherInfo).toBe(ModernAppReasons.NOSCRIPT);
  });

  it('should not flag traditional pages', () => {
    const tx = html('<html><head><script src="a.js"></script></head><body><a href="/a">A</a></body></html>');
    expect(detector.inspectResponse(tx)).toEqual([]);
  });

  it('should not flag pages without links, scripts or noscript', () => {
    expect(detector.inspectResponse(html('<html><body><p>Hello</p></body></html>'))).toEqual([]);
  });

  it('should only inspect HTML responses', () => {
    const tx = html('<script src="app.js"></script>', 'application/json');
    expect(detector.inspectResponse(tx)).toEqual([]);
  });

  it('should quote evidence found verbatim in the body', () => {
    const tx = html('<html><body><a   href="#"  >Spaced</a></body></html>');
    const [alert] = detector.inspectResponse(tx);
    expect(alert.evidence).toBe('<a   href="#"  >Spaced</a>');
    expect(tx.response?.bodyText()).toContain(alert.evidence);
  });
});
