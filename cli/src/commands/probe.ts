/**
 * Probe commands - black-box checks against the running demo services
 *
 * @license Apache-2.0
 */

import { Command } from 'commander';
import { createIntegrationFlowProbe } from '../../../src/lib/probe/IntegrationFlowProbe';
import { checkServicesHealth, defaultHealthTargets } from '../../../src/lib/probe/health';
import { DashboardApiClient } from '../../../src/lib/probe/DashboardApiClient';
import { DssApiClient } from '../../../src/lib/probe/DssApiClient';
import {
  dashboardBaseUrl,
  dssBaseUrl,
  loadProbeConfig,
  type ProbeOverrides,
} from '../../../src/lib/probe/probe-config';
import { MAX_WAIT_SECONDS, parseNonNegativeInt } from '../../../src/lib/config';
import { runAction } from '../lib/run';

type ProbeOptions = {
  host?: string;
  profile?: string;
  wait?: string;
};

function overridesFrom(options: ProbeOptions): ProbeOverrides {
  return {
    host: options.host,
    profile: options.profile,
    waitSeconds:
      options.wait === undefined ? undefined : parseNonNegativeInt(options.wait, '--wait', MAX_WAIT_SECONDS),
  };
}

export function probeCommand(program: Command) {
  const probe = program
    .command('probe')
    .description('Check the running Dashboard and DSS services')
    .option('--host <host>', 'Host the services listen on (default: PROBE_HOST or localhost)');

  probe
    .command('f1')
    .description('Run the F1 request flow: request-tool, wait, status, DSS job')
    .option('-p, --profile <profile>', 'lenient (missing hand-off warns) or strict (missing hand-off fails)')
    .option('-w, --wait <seconds>', 'Seconds to wait between submit and status check')
    .action((options: ProbeOptions) =>
      runAction(async () => {
        const config = loadProbeConfig(process.env, overridesFrom({ ...probe.opts<ProbeOptions>(), ...options }));

        console.log('Testing DSS F1 energy optimization request flow...');
        console.log(`Profile: ${config.profile.name}`);
        console.log('');

        const report = await createIntegrationFlowProbe(config).run();
        if (report.outcome === 'failed') {
          process.exit(1);
        }
      })
    );

  probe
    .command('health')
    .description('Check GET /health of the Dashboard and DSS APIs')
    .action(() =>
      runAction(async () => {
        const config = loadProbeConfig(process.env, overridesFrom(probe.opts<ProbeOptions>()));

        console.log('Testing service health...');
        const results = await checkServicesHealth(defaultHealthTargets(config));
        for (const result of results) {
          console.log(`${result.name}: ${result.ok ? 'OK' : 'FAILED'}`);
        }
        if (results.some((result) => !result.ok)) {
          process.exit(1);
        }
      })
    );

  probe
    .command('requests')
    .description('List tool requests known to the Dashboard API')
    .action(() =>
      runAction(async () => {
        const config = loadProbeConfig(process.env, overridesFrom(probe.opts<ProbeOptions>()));
        const requests = await new DashboardApiClient(dashboardBaseUrl(config)).listRequests();
        console.log(JSON.stringify(requests, null, 2));
      })
    );

  probe
    .command('jobs')
    .description('List jobs known to the DSS API')
    .action(() =>
      runAction(async () => {
        const config = loadProbeConfig(process.env, overridesFrom(probe.opts<ProbeOptions>()));
        const jobs = await new DssApiClient(dssBaseUrl(config), config.dssApiKey).listJobs();
        console.log(JSON.stringify(jobs, null, 2));
      })
    );
}
