/**
 * Target systems and environments of the tax agency web services.
 */

/**
 * Agency sub-systems reachable through SOAP
 */
export enum TaxSystem {
  /** Suministro Inmediato de Información: periodic ledger reporting */
  SII = 'sii',

  /** VeriFactu: real-time invoice verification */
  VERIFACTU = 'verifactu',
}

export enum TargetEnvironment {
  TEST = 'test',
  PRODUCTION = 'production',
}

/**
 * Display names as they appear in the agency documentation and config files
 */
export const TAX_SYSTEM_LABELS: Record<TaxSystem, string> = {
  [TaxSystem.SII]: 'SII',
  [TaxSystem.VERIFACTU]: 'VERIFACTU',
};

/**
 * Parse a system name, case-insensitive. Returns null for unknown names.
 */
export function parseTaxSystem(value: string): TaxSystem | null {
  switch (value.trim().toLowerCase()) {
    case 'sii':
      return TaxSystem.SII;
    case 'verifactu':
      return TaxSystem.VERIFACTU;
    default:
      return null;
  }
}

/**
 * Parse an environment name. The agency's own names (pruebas/produccion)
 * are accepted as aliases.
 */
export function parseTargetEnvironment(value: string): TargetEnvironment | null {
  switch (value.trim().toLowerCase()) {
    case 'test':
    case 'pruebas':
      return TargetEnvironment.TEST;
    case 'production':
    case 'produccion':
      return TargetEnvironment.PRODUCTION;
    default:
      return null;
  }
}
