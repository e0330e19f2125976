/**
 * ================================================================================
 * RESTART ORCHESTRATOR - Force Stop / Start State Machine
 * ================================================================================
 *
 * Force-stops an instance, waits until it is observed stopped, starts it, and
 * waits until it is observed running again.
 *
 * PHASES:
 * • awaiting-stop - stop --force issued, polling for 'stopped'
 * • awaiting-run  - start issued once, polling for 'running'
 * • converged     - running observed after the start; loop ends
 *
 * POLLING:
 * • Initial interval 21s, doubled exactly once when start is issued
 * • No iteration limit and no interval cap
 * • Every observation is a fresh lookup; lookup errors are fatal, never retried
 *
 * //! Nothing is rolled back: a failure after stop leaves the instance stopped
 */

import type { DiagnosticLogger } from '../types';
import type { Ec2Instance } from './instance';
import type { InstanceLocator } from './locator';

export const INITIAL_POLL_INTERVAL_SECONDS = 21;

export type RestartPhase = 'awaiting-stop' | 'awaiting-run' | 'converged';

export type Sleep = (ms: number) => Promise<void>;

export type InstanceSource = Pick<InstanceLocator, 'byId' | 'reload'>;

export interface RestartOptions {
    pollIntervalSeconds?: number;
    sleep?: Sleep;
}

export interface RestartSummary {
    instanceId: string;
    polls: number;                  // Reloads performed inside the loop
    pollIntervalSeconds: number;    // Interval in effect when the loop ended
    durationMs: number;
}

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class RestartOrchestrator {
    private readonly initialInterval: number;
    private readonly sleep: Sleep;

    constructor(
        private readonly locator: InstanceSource,
        private readonly logger: DiagnosticLogger,
        options: RestartOptions = {}
    ) {
        this.initialInterval = options.pollIntervalSeconds ?? INITIAL_POLL_INTERVAL_SECONDS;
        this.sleep = options.sleep ?? defaultSleep;
    }

    async forceRestart(instanceId: string): Promise<RestartSummary> {
        const timer = this.logger.timer('force-restart');

        let instance = await this.locator.byId(instanceId);
        this.logState(instance);

        this.logger.step('RESTART_STOP', 'Issuing forced stop', { instanceId: instance.id() });
        await instance.stop({ force: true });

        let phase: RestartPhase = 'awaiting-stop';
        let interval = this.initialInterval;
        let polls = 0;

        while (phase !== 'converged') {
            await this.wait(interval);
            instance = await this.locator.reload(instance);
            polls += 1;
            this.logState(instance);

            if (phase === 'awaiting-stop' && instance.isStopped()) {
                this.logger.step('RESTART_START', 'Stop observed, issuing start', { polls });
                await instance.start();
                interval *= 2;
                phase = 'awaiting-run';
            } else if (phase === 'awaiting-run' && instance.isRunning()) {
                phase = 'converged';
            }
        }

        return {
            instanceId: instance.id(),
            polls,
            pollIntervalSeconds: interval,
            durationMs: timer.end()
        };
    }

    private logState(instance: Ec2Instance): void {
        this.logger.info(`state: ${instance.state()}`);
    }

    private async wait(seconds: number): Promise<void> {
        const spinner = this.logger.spinner(`Next observation in ${seconds}s`);
        try {
            await this.sleep(seconds * 1000);
        } finally {
            spinner.stop();
        }
    }
}
