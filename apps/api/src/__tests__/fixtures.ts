import fs from 'fs';
import os from 'os';
import path from 'path';

export const TRANSCRIPTIONS_CSV = [
  'sample_name,medical_specialty,description,transcription,keywords,age',
  'Echo Review,Cardiology,Echo for dyspnea,"Mild mitral regurgitation, normal LV size.","cardiology, echo",54',
  'Knee Scope,Orthopedic,Right knee arthroscopy,"Arthroscopic debridement of the medial meniscus.","orthopedic, knee",37',
  'Stress Test,Cardiology,Treadmill stress test,"No ischemic changes at peak exercise.","cardiology, stress",'
].join('\n');

export const makeTempDir = () => fs.mkdtempSync(path.join(os.tmpdir(), 'ehr-insights-'));

export const removeDir = (dir: string) => fs.rmSync(dir, { recursive: true, force: true });

export const writeFile = (dir: string, name: string, contents: string) => {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, contents);
  return filePath;
};

export const VALID_INSIGHT = {
  summary: 'Echocardiogram with preserved systolic function.',
  key_findings: ['Mildly dilated left atrium', 'Ejection fraction 55%'],
  medical_terms: ['ejection fraction', 'diastolic dysfunction'],
  recommendations: ['Repeat echocardiogram in twelve months'],
  specialty_context: 'Routine cardiology follow-up of exertional dyspnea.'
};
