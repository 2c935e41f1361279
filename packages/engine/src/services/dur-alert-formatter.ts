import {
  CLINICAL_SIGNIFICANCE_LABELS,
  DUR_ALERT_LABELS,
  toNcpdpDate,
  type DurAlert,
  type DurOverride,
  type NcpdpDurResponse,
} from '@rxadjudicate/shared';

function otherDrug(alert: DurAlert): string | undefined {
  switch (alert.type) {
    case 'DRUG_DRUG':
      return alert.interactingDrug.name ?? alert.interactingDrug.ndc;
    case 'THERAPEUTIC_DUPLICATION':
      return alert.duplicateDrug.name ?? alert.duplicateDrug.ndc;
    default:
      return undefined;
  }
}

/** Multi-line, human-readable rendering of an alert. */
export function formatAlertForDisplay(alert: DurAlert): string {
  const lines = [
    `[${CLINICAL_SIGNIFICANCE_LABELS[alert.significance]}] ${DUR_ALERT_LABELS[alert.type]}`,
    `  Drug: ${alert.drug.name ?? alert.drug.ndc}`,
  ];
  const interacting = otherDrug(alert);
  if (interacting) lines.push(`  Interacting Drug: ${interacting}`);
  lines.push(`  Message: ${alert.message}`);
  if (alert.recommendation) lines.push(`  Recommendation: ${alert.recommendation}`);
  if (alert.type === 'EARLY_REFILL') lines.push(`  Days Early: ${alert.daysEarly}`);
  return lines.join('\n');
}

/**
 * DUR/PPS response fields for one alert. Intervention and outcome codes are
 * filled from the override recorded against the alert type, if any.
 */
export function formatAlertForNcpdp(alert: DurAlert, override?: DurOverride): NcpdpDurResponse {
  return {
    reasonForService: alert.reasonForService,
    clinicalSignificance: String(alert.significance),
    otherPharmacyIndicator: '',
    previousFillDate: alert.type === 'EARLY_REFILL' ? toNcpdpDate(alert.previousFillDate) : '',
    quantityOfPreviousFill: '',
    databaseIndicator: '1',
    otherPrescriberIndicator: '',
    conflictCode: alert.reasonForService,
    interventionCode: override?.professionalService ?? '',
    outcomeCode: override?.resultOfService ?? '',
  };
}
