import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFileSync } from 'fs';
import { join } from 'path';
import { workstationPipeline } from '../workstation';
import { createFakeWorld } from './fakes';
import type { FakeWorld } from './fakes';

const PLAN = '01_ec2_workstation';

describe('workstationPipeline', () => {
  let world: FakeWorld;

  afterEach(() => world.cleanup());

  describe('with an SSH key in place', () => {
    beforeEach(() => {
      world = createFakeWorld();
      world.infra.plan(PLAN, ['aws_instance.workstation'], { public_ip: '203.0.113.10' });
    });

    it('should create the workstation', async () => {
      const report = await world.orchestrator().runPipeline(workstationPipeline(world.services), world.ctx);

      expect(report.results[0]).toMatchObject({ stageName: 'provision-workstation', status: 'applied', detail: 'Created 1 resource(s)' });
      expect(world.ctx.outputs.get('public_ip')).toBe('203.0.113.10');
      expect(world.runner.calls.some(call => call.command === 'ssh-keygen')).toBe(false);
    });

    it('should skip when the tagged instance exists and the plan has no drift', async () => {
      await world.orchestrator().runPipeline(workstationPipeline(world.services), world.ctx);
      world.inventory.instances.set('DevOps-Workstation', [{ instanceId: 'i-0abc123', state: 'running' }]);

      const report = await world.orchestrator().runPipeline(workstationPipeline(world.services), world.ctx);

      expect(report.results[0].status).toBe('skipped');
    });

    it('should destroy a half-applied plan when the apply fails', async () => {
      world.infra.failures.set(`apply ${PLAN}`, new Error('InstanceLimitExceeded'));

      const report = await world.orchestrator().runPipeline(workstationPipeline(world.services), world.ctx);

      expect(report.results[0]).toMatchObject({ status: 'rolled_back', detail: 'InstanceLimitExceeded' });
      expect(world.infra.calls).toEqual([`apply ${PLAN}`, `destroy ${PLAN}`]);
      expect(report.exitCode).toBe(1);
    });
  });

  describe('without an SSH key', () => {
    beforeEach(() => {
      world = createFakeWorld({ sshKey: false });
      world.infra.plan(PLAN, ['aws_instance.workstation']);
      world.runner.respond(call => {
        if (call.command !== 'ssh-keygen') {
          return undefined;
        }
        writeFileSync(`${call.args[5]}.pub`, 'ssh-rsa AAAATEST generated');
        return { code: 0 };
      });
    });

    it('should generate the key pair and then create the workstation', async () => {
      const report = await world.orchestrator().runPipeline(workstationPipeline(world.services), world.ctx);

      const keygen = world.runner.calls.find(call => call.command === 'ssh-keygen');
      expect(keygen?.args).toEqual(['-t', 'rsa', '-b', '2048', '-f', join(world.sshDir, 'pin'), '-N', '']);
      expect(report.results[0].status).toBe('applied');
    });
  });

  describe('when key generation fails', () => {
    beforeEach(() => {
      world = createFakeWorld({ sshKey: false });
      world.runner.on('ssh-keygen', { code: 1, stderr: 'Saving key failed: permission denied' });
    });

    it('should fail the stage and name the recovery that did not help', async () => {
      const publicKey = join(world.sshDir, 'pin.pub');

      const report = await world.orchestrator().runPipeline(workstationPipeline(world.services), world.ctx);

      expect(report.results[0]).toMatchObject({
        status: 'failed',
        detail: `Precondition "${publicKey} exists" not met: ${publicKey} not found`,
        remediation: 'Recovery "generate-ssh-key" did not resolve it'
      });
      expect(world.infra.calls).toEqual([]);
    });
  });
});
