export interface StepTherapyResult {
  protocolId: string;
  targetNdc: string;
  satisfied: boolean;
  completedSteps: number[];
  failedStep?: number;
  requiredDrugs: string[];
  message: string;
}
