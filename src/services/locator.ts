/**
 * ================================================================================
 * INSTANCE LOCATOR - Lookup by Name Tag or Instance ID
 * ================================================================================
 *
 * Resolves exactly one instance through `aws ec2 describe-instances` and wraps
 * it in an Ec2Instance. Every observation is a full lookup; there is no cache.
 *
 * LOOKUP FLOW:
 * 1. Trim and validate the argument (blank -> ArgumentError, nothing executed)
 * 2. Run describe-instances with a single filter
 * 3. Parse JSON and flatten Reservations[].Instances[]
 * 4. Disambiguate (exactly one match)
 */

import { describeInstancesCommand } from '../aws/cli';
import type { AwsCliOptions, DiagnosticLogger, InstanceDescription } from '../types';
import { ArgumentError, MalformedResultError } from '../utils/errors';
import type { CommandRunner } from './commandRunner';
import { singular } from './disambiguator';
import { Ec2Instance } from './instance';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isInstanceDescription(value: unknown): value is InstanceDescription {
    return isRecord(value)
        && typeof value.InstanceId === 'string'
        && isRecord(value.State)
        && typeof value.State.Name === 'string';
}

/**
 * Flatten describe-instances output into the list of candidate instances
 *
 * @throws MalformedResultError when the output is not JSON or not shaped like
 *         {"Reservations": [{"Instances": [...]}]}
 */
export function describedInstances(output: string): InstanceDescription[] {
    let parsed: unknown;
    try {
        parsed = JSON.parse(output);
    } catch (error) {
        throw new MalformedResultError('Lookup output is not valid JSON', output, { cause: error });
    }

    if (!isRecord(parsed) || !Array.isArray(parsed.Reservations)) {
        throw new MalformedResultError('Lookup output has no Reservations list', output);
    }

    return parsed.Reservations.flatMap((reservation: unknown) => {
        if (!isRecord(reservation) || !Array.isArray(reservation.Instances)) {
            throw new MalformedResultError('Reservation has no Instances list', output);
        }
        return reservation.Instances.map((instance: unknown) => {
            if (!isInstanceDescription(instance)) {
                throw new MalformedResultError('Instance entry lacks InstanceId or State.Name', output);
            }
            return instance;
        });
    });
}

export class InstanceLocator {
    constructor(
        private readonly runner: CommandRunner,
        private readonly cli: AwsCliOptions,
        private readonly logger: DiagnosticLogger
    ) {}

    /**
     * Find the instance whose Name tag equals `name`
     */
    async byName(name: string): Promise<Ec2Instance> {
        return this.lookup('tag:Name', name, 'name');
    }

    async byId(id: string): Promise<Ec2Instance> {
        return this.lookup('instance-id', id, 'ID');
    }

    /**
     * Fresh lookup of the same instance; the old object is left untouched
     */
    async reload(instance: Ec2Instance): Promise<Ec2Instance> {
        return this.byId(instance.id());
    }

    private async lookup(filter: string, value: string, label: string): Promise<Ec2Instance> {
        const trimmed = value.trim();
        if (!trimmed) {
            throw new ArgumentError(`Instance ${label} must not be blank`);
        }

        const output = await this.runner.run(describeInstancesCommand(this.cli, filter, trimmed));
        const description = singular(describedInstances(output));
        this.logger.debug('Instance resolved', {
            filter,
            value: trimmed,
            instanceId: description.InstanceId
        });
        return new Ec2Instance(description, this.runner, this.cli);
    }
}
