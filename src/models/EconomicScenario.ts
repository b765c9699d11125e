/**
 * Economic scenario data structure
 */

export interface EconomicScenario {
  cdiAnnual: number; // Annual CDI as a decimal (e.g., 0.1375 for 13.75%)
  ipcaAnnual: number; // Annual IPCA as a decimal
}
