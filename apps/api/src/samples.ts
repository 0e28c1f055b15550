import type { TranscriptionRecord } from './types/schema';

export const sampleTranscription: TranscriptionRecord = {
  medical_specialty: 'Cardiovascular / Pulmonary',
  transcription: `
    ECHOCARDIOGRAM REPORT
    INDICATION: Exertional dyspnea.
    FINDINGS:
    1. Mildly dilated left atrium.
    2. Left ventricular size within normal limits, ejection fraction estimated at 55%.
    3. Grade I diastolic dysfunction.
    4. Trace mitral regurgitation; aortic valve opens normally.
    5. No pericardial effusion.
    IMPRESSION: Preserved systolic function with mild diastolic dysfunction.
    PLAN: Blood pressure control and repeat study in twelve months.
  `
};
