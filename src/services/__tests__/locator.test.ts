import { describe, it, expect, beforeEach } from 'vitest';
import { CommandRunner } from '../commandRunner';
import { InstanceLocator, describedInstances } from '../locator';
import {
  AmbiguousResultError,
  ArgumentError,
  EmptyResultError,
  MalformedResultError
} from '../../utils/errors';
import {
  RecordingLogger,
  ScriptedAwsCli,
  describeOutput,
  instanceDescription
} from '../../__tests__/helpers/fakes';

describe('describedInstances', () => {
  it('flattens instances across reservations', () => {
    const output = describeOutput(
      [instanceDescription('i-1', 'running')],
      [instanceDescription('i-2', 'stopped'), instanceDescription('i-3', 'pending')]
    );

    expect(describedInstances(output).map((instance) => instance.InstanceId)).toEqual(['i-1', 'i-2', 'i-3']);
  });

  it('returns an empty list when nothing matched', () => {
    expect(describedInstances('{"Reservations": []}')).toEqual([]);
  });

  it('rejects output that is not JSON', () => {
    expect(() => describedInstances('')).toThrow(MalformedResultError);
    expect(() => describedInstances('An error occurred (UnauthorizedOperation)')).toThrow(
      'Lookup output is not valid JSON'
    );
  });

  it('rejects output without Reservations', () => {
    expect(() => describedInstances('{"Instances": []}')).toThrow('Lookup output has no Reservations list');
    expect(() => describedInstances('[]')).toThrow('Lookup output has no Reservations list');
  });

  it('rejects a reservation without Instances', () => {
    expect(() => describedInstances('{"Reservations": [{}]}')).toThrow('Reservation has no Instances list');
  });

  it('rejects an instance without InstanceId or State.Name', () => {
    expect(() => describedInstances('{"Reservations": [{"Instances": [{"InstanceId": "i-1"}]}]}')).toThrow(
      'Instance entry lacks InstanceId or State.Name'
    );
    expect(() => describedInstances('{"Reservations": [{"Instances": [{"State": {"Name": "running"}}]}]}')).toThrow(
      'Instance entry lacks InstanceId or State.Name'
    );
  });

  it('keeps the raw output on the error', () => {
    try {
      describedInstances('not json');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedResultError);
      if (error instanceof MalformedResultError) {
        expect(error.output).toBe('not json');
      }
    }
  });
});

describe('InstanceLocator', () => {
  let logger: RecordingLogger;

  function locatorFor(aws: ScriptedAwsCli): InstanceLocator {
    const runner = new CommandRunner({
      logger,
      executor: aws.executor,
      confirmer: { confirm: async () => true }
    });
    return new InstanceLocator(runner, { executable: 'aws' }, logger);
  }

  beforeEach(() => {
    logger = new RecordingLogger();
  });

  it('finds an instance by Name tag, trimming the input', async () => {
    const aws = new ScriptedAwsCli([describeOutput([instanceDescription('i-0abc', 'running')])]);

    const instance = await locatorFor(aws).byName('  web-1 \n');

    expect(instance.id()).toBe('i-0abc');
    expect(aws.calls).toEqual([
      { file: 'aws', args: ['ec2', 'describe-instances', '--filters', 'Name=tag:Name,Values=web-1'] }
    ]);
  });

  it('finds an instance by ID', async () => {
    const aws = new ScriptedAwsCli([describeOutput([instanceDescription('i-0abc', 'stopped')])]);

    const instance = await locatorFor(aws).byId('i-0abc');

    expect(instance.state()).toBe('stopped');
    expect(aws.calls[0].args).toEqual(['ec2', 'describe-instances', '--filters', 'Name=instance-id,Values=i-0abc']);
  });

  it.each(['', '   ', '\t\n'])('rejects blank input %j before running anything', async (value) => {
    const aws = new ScriptedAwsCli([]);
    const locator = locatorFor(aws);

    await expect(locator.byName(value)).rejects.toThrow(ArgumentError);
    await expect(locator.byId(value)).rejects.toThrow(ArgumentError);
    expect(aws.calls).toEqual([]);
  });

  it('fails when no instance matches', async () => {
    const aws = new ScriptedAwsCli([describeOutput()]);

    await expect(locatorFor(aws).byName('missing')).rejects.toThrow(EmptyResultError);
  });

  it('fails when the name tag is shared by several instances', async () => {
    const aws = new ScriptedAwsCli([
      describeOutput([instanceDescription('i-1', 'running')], [instanceDescription('i-2', 'running')])
    ]);

    await expect(locatorFor(aws).byName('web')).rejects.toThrow(AmbiguousResultError);
  });

  it('fails on malformed output before disambiguation', async () => {
    const aws = new ScriptedAwsCli(['{"Unexpected": true}']);

    await expect(locatorFor(aws).byId('i-1')).rejects.toThrow(MalformedResultError);
  });

  it('reloads into a new object with the current state', async () => {
    const aws = new ScriptedAwsCli([
      describeOutput([instanceDescription('i-1', 'running')]),
      describeOutput([instanceDescription('i-1', 'stopping')])
    ]);
    const locator = locatorFor(aws);

    const first = await locator.byId('i-1');
    const second = await locator.reload(first);

    expect(second).not.toBe(first);
    expect(first.state()).toBe('running');
    expect(second.state()).toBe('stopping');
    expect(aws.calls[1].args).toEqual(['ec2', 'describe-instances', '--filters', 'Name=instance-id,Values=i-1']);
  });
});
