/**
 * Env command - reports whether this machine can run Retrieve.exe
 */

import type { ProcessRunner } from '../../core/runner.js';
import { systemHost, type HostEnvironment } from '../../utils/environment.js';
import { checkWindowsEnvironment, type EnvironmentReport } from '../../utils/retrievePath.js';

export interface EnvOptions {
  json: boolean;
}

export interface EnvDeps {
  host?: HostEnvironment;
  runner?: ProcessRunner;
}

function yesNo(value: boolean | undefined): string {
  return value ? 'yes' : 'no';
}

export function formatEnvironmentReport(report: EnvironmentReport): string {
  const lines = [
    '🖥️  Environment',
    `   OS:                  ${report.os} (${report.architecture})`,
    `   OS version:          ${report.osVersion}`,
    `   Windows compatible:  ${yesNo(report.isWindowsCompatible)}`,
    `   Retrieve.exe on PATH: ${yesNo(report.retrieveInPath)}`,
  ];

  if (report.defaultPathsAvailable.length > 0) {
    lines.push('   Installed at:');
    for (const path of report.defaultPathsAvailable) {
      lines.push(`     - ${path}`);
    }
  } else {
    lines.push('   Installed at:        (none of the default locations)');
  }

  if (report.isWsl !== undefined) {
    lines.push(`   WSL:                 ${yesNo(report.isWsl)}`);
  }
  if (report.windowsCAccessible !== undefined) {
    lines.push(`   C: drive mounted:    ${yesNo(report.windowsCAccessible)}`);
  }
  if (report.retrieveExeFound !== undefined) {
    lines.push(`   Retrieve.exe runs:   ${yesNo(report.retrieveExeWorking)}`);
  }

  return lines.join('\n');
}

export async function envCommand(options: EnvOptions, deps: EnvDeps = {}): Promise<EnvironmentReport> {
  const report = await checkWindowsEnvironment(deps.host ?? systemHost, deps.runner);

  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    console.log(formatEnvironmentReport(report));
    if (!report.isWindowsCompatible) {
      console.log('\n💡 Retrieve.exe needs Windows or WSL.');
    }
  }

  return report;
}
