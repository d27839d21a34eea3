import { classifyInvoiceType, extractCufeFromUrl, isPortalUrl } from '../../../src/utils/portalUrl';

const PORTAL = 'dgi-fep.mef.gob.pa';

describe('extractCufeFromUrl', () => {
  it('reads the chFE parameter', () => {
    expect(extractCufeFromUrl('https://dgi-fep.mef.gob.pa/Consultas/FacturasPorQR?chFE=FE01abc&iAmb=1')).toBe('FE01abc');
  });

  it('returns null when absent or unparsable', () => {
    expect(extractCufeFromUrl('https://dgi-fep.mef.gob.pa/Consultas/FacturasPorQR?iAmb=1')).toBeNull();
    expect(extractCufeFromUrl('not a url')).toBeNull();
  });
});

describe('isPortalUrl', () => {
  it('accepts the portal host and its subdomains', () => {
    expect(isPortalUrl('https://dgi-fep.mef.gob.pa/Consultas', PORTAL)).toBe(true);
    expect(isPortalUrl('http://www.dgi-fep.mef.gob.pa/', PORTAL)).toBe(true);
  });

  it('rejects look-alike hosts and other schemes', () => {
    expect(isPortalUrl('https://dgi-fep.mef.gob.pa.example.com/', PORTAL)).toBe(false);
    expect(isPortalUrl('https://example.com/?chFE=FE01', PORTAL)).toBe(false);
    expect(isPortalUrl('ftp://dgi-fep.mef.gob.pa/', PORTAL)).toBe(false);
    expect(isPortalUrl('dgi-fep.mef.gob.pa', PORTAL)).toBe(false);
  });
});

describe('classifyInvoiceType', () => {
  it('QR consultations', () => {
    expect(classifyInvoiceType('https://dgi-fep.mef.gob.pa/Consultas/FacturasPorQR?chFE=FE01')).toBe('QR');
  });

  it('CUFE when an identifier is present', () => {
    expect(classifyInvoiceType('https://dgi-fep.mef.gob.pa/Consultas/FacturasPorCUFE?chFE=FE01')).toBe('CUFE');
    expect(classifyInvoiceType('https://dgi-fep.mef.gob.pa/Consultas', 'FE01')).toBe('CUFE');
  });

  it('GENERIC otherwise', () => {
    expect(classifyInvoiceType('https://dgi-fep.mef.gob.pa/Consultas')).toBe('GENERIC');
  });
});
