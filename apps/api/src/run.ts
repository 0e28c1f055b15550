import './utils/env';
import path from 'path';
import { getConfig } from './config';
import { analyzeFile } from './ingest/csv';
import { importFile } from './ingest/db';
import { InsightClient } from './insights';
import { sampleTranscription } from './samples';
import { StoreSession } from './store';
import { toError } from './utils/error';
import { askLine } from './utils/prompt';

const divider = (title: string) => {
  const line = '='.repeat(80);
  const padded = ` ${title} `;
  const left = Math.floor((80 - padded.length) / 2);
  console.log(`\n${line}\n${padded.padStart(left + padded.length, '=').padEnd(80, '=')}\n${line}\n`);
};

const runImport = async (csvFile: string) => {
  divider('DATA IMPORT');

  console.log(`Analyzing file: ${csvFile}`);
  const analysis = await analyzeFile(csvFile);
  console.log(`Found ${analysis.rowCount} rows and ${analysis.columnCount} columns`);

  console.log('\nImporting to database...');
  const result = await importFile(csvFile);
  console.log(`Import complete: ${result.rowsImported} rows imported to '${result.tableName}'`);
  console.log(`Database created at: ${result.databasePath}`);
};

const runDataAccess = async (session: StoreSession) => {
  divider('DATA ACCESS');

  console.log('Connecting to database...');
  if (!session.connect()) {
    console.log('Failed to connect to database or no tables found.');
    return false;
  }

  console.log('\nTranscriptions by specialty:');
  for (const item of session.getSpecialtySummary()) {
    console.log(`  - ${item.label}: ${item.count} records`);
  }

  const term = await askLine('\nEnter a search term (or press Enter to skip): ');

  if (term) {
    const results = session.search(term, 3);
    console.log(`\nFound ${results.length} results for '${term}':`);
    for (const item of results) {
      const description = String(item.description ?? '').slice(0, 100);
      console.log(`  - ${item.sample_name} (${item.medical_specialty}): ${description}...`);
    }
  }
  return true;
};

const runInsights = async () => {
  divider('INSIGHTS');
  console.log('Medical Transcription Analyzer');

  const client = new InsightClient();
  try {
    client.initialize();
  } catch (err) {
    console.log(`Error: ${toError(err).message}`);
    console.log('Please set GEMINI_API_KEY in the environment.');
    return false;
  }

  try {
    console.log('\nAnalyzing...');
    const insight = await client.analyze(sampleTranscription);

    console.log('\nANALYSIS RESULTS:');
    console.log(`\nSummary: ${insight.summary}`);
    console.log('\nKey Findings:');
    insight.key_findings.forEach(finding => console.log(`- ${finding}`));
    console.log('\nMedical Terms:');
    insight.medical_terms.forEach(term => console.log(`- ${term}`));
    console.log('\nRecommendations:');
    insight.recommendations.forEach(rec => console.log(`- ${rec}`));
    console.log(`\nSpecialty Context: ${insight.specialty_context}`);
    return true;
  } catch (err) {
    console.log(`Error during analysis: ${toError(err).message}`);
    return false;
  }
};

const main = async () => {
  console.log('Starting Medical Transcription Analysis');
  const csvFile = process.argv[2] || path.join(getConfig().dataDir, 'raw', 'mtsamples.csv');

  try {
    await runImport(csvFile);
  } catch (err) {
    console.log(`Import failed: ${toError(err).message}`);
  }

  const session = new StoreSession();
  try {
    if (await runDataAccess(session)) await runInsights();
  } finally {
    session.close();
  }

  console.log('\nCompleted!');
};

main().catch(err => {
  console.error(toError(err).message);
  process.exitCode = 1;
});
