import { describe, it, expect } from 'vitest';
import { InputValidationError } from '../../lib/errors.js';
import {
  DurRulesEngine,
  checkAgeRestriction,
  checkDrugDrugInteractions,
  checkEarlyRefill,
  checkGenderRestriction,
  checkTherapeuticDuplication,
} from '../../services/dur-rules.service.js';
import { DRUGS, SERVICE_DATE, fill, medication, staticRules, testSnapshot } from '../helpers/fixtures.js';

const snapshot = testSnapshot();

describe('checkDrugDrugInteractions', () => {
  it('flags an NSAID for a member on warfarin at the highest severity', () => {
    const alerts = checkDrugDrugInteractions(snapshot, DRUGS.ibuprofen, [medication(DRUGS.warfarin)]);
    expect(alerts).toEqual([
      {
        type: 'DRUG_DRUG',
        significance: 1,
        drug: DRUGS.ibuprofen,
        interactingDrug: DRUGS.warfarin,
        interactionId: 'DD-001',
        clinicalEffect: 'NSAIDs increase anticoagulant effect and bleeding risk',
        message: 'Increased bleeding risk',
        recommendation: 'Avoid combination or use with close monitoring',
        reasonForService: 'MA',
      },
    ]);
  });

  it('matches the pair in either direction', () => {
    const alerts = checkDrugDrugInteractions(snapshot, DRUGS.warfarin, [medication(DRUGS.ibuprofen)]);
    expect(alerts.map((a) => a.interactionId)).toEqual(['DD-001']);
  });

  it('emits one alert per interacting medication', () => {
    const alerts = checkDrugDrugInteractions(snapshot, DRUGS.clarithromycin, [
      medication(DRUGS.atorvastatin),
      medication(DRUGS.lisinopril),
      medication(DRUGS.simvastatin),
    ]);
    expect(alerts.map((a) => [a.interactionId, a.interactingDrug.ndc, a.significance])).toEqual([
      ['DD-002', DRUGS.atorvastatin.ndc, 2],
      ['DD-002', DRUGS.simvastatin.ndc, 2],
    ]);
  });

  it('returns nothing without a class code or current medications', () => {
    expect(checkDrugDrugInteractions(snapshot, { ndc: DRUGS.ibuprofen.ndc }, [medication(DRUGS.warfarin)])).toEqual([]);
    expect(checkDrugDrugInteractions(snapshot, DRUGS.ibuprofen, [])).toEqual([]);
  });
});

describe('checkTherapeuticDuplication', () => {
  it('flags a second statin', () => {
    const alerts = checkTherapeuticDuplication(snapshot, DRUGS.atorvastatin, [medication(DRUGS.simvastatin)]);
    expect(alerts).toHaveLength(1);
    expect(alerts[0]).toMatchObject({
      type: 'THERAPEUTIC_DUPLICATION',
      significance: 2,
      duplicationId: 'TD-001',
      duplicateDrug: { ndc: DRUGS.simvastatin.ndc },
      message: 'Therapeutic duplication: Statins',
      recommendation: 'Maximum 1 concurrent',
      reasonForService: 'TD',
    });
  });

  it('ignores a refill of the same exact product', () => {
    expect(checkTherapeuticDuplication(snapshot, DRUGS.atorvastatin, [medication(DRUGS.atorvastatin)])).toEqual([]);
  });

  it('waits until the group maximum is reached', () => {
    expect(checkTherapeuticDuplication(snapshot, DRUGS.oxycodone, [medication(DRUGS.hydrocodone)])).toEqual([]);

    const alerts = checkTherapeuticDuplication(snapshot, DRUGS.oxycodone, [
      medication(DRUGS.hydrocodone),
      medication(DRUGS.tramadol),
    ]);
    expect(alerts.map((a) => a.duplicateDrug.ndc)).toEqual([DRUGS.hydrocodone.ndc, DRUGS.tramadol.ndc]);
    expect(alerts[0].recommendation).toBe('Maximum 2 concurrent');
  });
});

describe('checkEarlyRefill', () => {
  const history = [fill(DRUGS.omeprazole, '2026-03-05', 30, 30)];

  it('reports days early against the previous fill', () => {
    expect(checkEarlyRefill(DRUGS.omeprazole, SERVICE_DATE, history)).toEqual({
      type: 'EARLY_REFILL',
      significance: 3,
      drug: DRUGS.omeprazole,
      daysEarly: 20,
      previousFillDate: '2026-03-05',
      expectedExhaustionDate: '2026-04-04',
      message: 'Refill 20 days early',
      recommendation: 'Wait until medication supply is lower',
      reasonForService: 'ER',
    });
  });

  it('does not alert on or after the exhaustion date', () => {
    expect(checkEarlyRefill(DRUGS.omeprazole, '2026-04-04', history)).toBeNull();
    expect(checkEarlyRefill(DRUGS.omeprazole, '2026-04-10', history)).toBeNull();
  });

  it('does not alert without a prior fill of the same code', () => {
    expect(checkEarlyRefill(DRUGS.brandPpi, SERVICE_DATE, history)).toBeNull();
  });

  it('lets refills inside the grace period through', () => {
    expect(checkEarlyRefill(DRUGS.omeprazole, SERVICE_DATE, history, 20)).toBeNull();
    expect(checkEarlyRefill(DRUGS.omeprazole, SERVICE_DATE, history, 19)?.daysEarly).toBe(20);
  });
});

describe('checkAgeRestriction', () => {
  it('flags an age outside the configured range', () => {
    const alert = checkAgeRestriction(snapshot, DRUGS.methylphenidate, 70);
    expect(alert).toMatchObject({
      type: 'DRUG_AGE',
      significance: 2,
      restrictionId: 'AGE-001',
      patientAge: 70,
      message: 'CNS stimulants are indicated for ages 6 to 65',
      recommendation: 'Patient age 70 outside range 6-65',
      reasonForService: 'PA',
    });
  });

  it('passes an age inside the range', () => {
    expect(checkAgeRestriction(snapshot, DRUGS.methylphenidate, 30)).toBeNull();
  });

  it('never alerts for a drug without a restriction', () => {
    expect(checkAgeRestriction(snapshot, DRUGS.lisinopril, undefined)).toBeNull();
  });

  it('requires the age when a restriction applies', () => {
    expect(() => checkAgeRestriction(snapshot, DRUGS.methylphenidate, undefined)).toThrow(InputValidationError);
  });
});

describe('checkGenderRestriction', () => {
  it('flags a gender outside the allowed one', () => {
    const alert = checkGenderRestriction(snapshot, DRUGS.testosterone, 'F');
    expect(alert).toMatchObject({
      type: 'DRUG_GENDER',
      significance: 1,
      patientGender: 'F',
      allowedGender: 'M',
      recommendation: 'Drug intended for gender: M',
      reasonForService: 'PG',
    });
  });

  it('passes the allowed gender', () => {
    expect(checkGenderRestriction(snapshot, DRUGS.testosterone, 'M')).toBeNull();
  });
});

describe('DurRulesEngine', () => {
  it('runs every check and returns alerts in check order', () => {
    const engine = new DurRulesEngine(staticRules(snapshot), 0);
    const alerts = engine.check({
      drug: DRUGS.atorvastatin,
      serviceDate: SERVICE_DATE,
      age: 50,
      gender: 'M',
      currentMedications: [medication(DRUGS.simvastatin), medication(DRUGS.clarithromycin)],
      history: [fill(DRUGS.atorvastatin, '2026-03-01', 30, 30)],
    });
    expect(alerts.map((a) => a.type)).toEqual(['DRUG_DRUG', 'THERAPEUTIC_DUPLICATION', 'EARLY_REFILL']);
  });
});
