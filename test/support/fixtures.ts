import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'choreo-report-'));
}

function removeDir(dirPath: string): void {
  fs.rmSync(dirPath, { recursive: true, force: true });
}

/**
 * Writes `content` as JSON and pins the file's modification time to
 * `mtimeSeconds` (epoch seconds) when given.
 */
function writeReport(
  dirPath: string,
  name: string,
  content: unknown,
  mtimeSeconds?: number,
): string {
  const filePath = path.join(dirPath, name);
  fs.writeFileSync(filePath, JSON.stringify(content), 'utf8');
  if (mtimeSeconds !== undefined) {
    fs.utimesSync(filePath, mtimeSeconds, mtimeSeconds);
  }
  return filePath;
}

function passedStep(name: string) {
  return { name, result: { status: 'passed', durationInMs: 3 } };
}

function failedStep(name: string, errorMessage = 'expected output not seen') {
  return { name, result: { status: 'failed', durationInMs: 12, errorMessage } };
}

const sampleReport = [
  {
    uri: 'suites/login.chor',
    keyword: 'Feature',
    name: 'Login',
    elements: [
      {
        keyword: 'Scenario',
        name: 'valid credentials',
        steps: [passedStep('opens prompt'), failedStep('sees welcome')],
        after: [passedStep("Terminal runs 'logout'")],
      },
    ],
    summary: { tests: 2, failures: 1, totalTimeInSeconds: 0.5 },
  },
];

export { failedStep, makeTempDir, passedStep, removeDir, sampleReport, writeReport };
