import { describe, expect, test } from 'vitest';
import { CommandError, DetectionError } from '../../src/core/errors.js';
import {
  IpOwnershipManager,
  parseInterfaceBroadcasts,
  parseInterfacePrefix,
  parseRouteInterface,
} from '../../src/network/IpOwnershipManager.js';
import { FakeExecutor, recordingLogger } from '../helpers/fakes.js';

const TARGET = '192.168.1.50';
const ROUTE = '192.168.1.50 dev eth0 src 192.168.1.10 uid 0 \n    cache \n';
const ADDR =
  '2: eth0    inet 192.168.1.10/24 brd 192.168.1.255 scope global eth0\\       valid_lft forever preferred_lft forever\n';

function lan(): FakeExecutor {
  return new FakeExecutor().on('ip route get', { stdout: ROUTE }).on('ip -o -f inet addr show', { stdout: ADDR });
}

function manager(executor: FakeExecutor, prefixLength: number | null = null) {
  const logger = recordingLogger();
  const owner = new IpOwnershipManager(TARGET, { executor, prefixLength, logger, arpSpacingMs: 0 });
  return { owner, logger };
}

describe('parsers', () => {
  test('parseRouteInterface', () => {
    expect(parseRouteInterface(ROUTE)).toBe('eth0');
    expect(parseRouteInterface('192.168.1.50 via 192.168.1.1 dev wlp2s0 src 192.168.1.7')).toBe('wlp2s0');
    expect(parseRouteInterface('unreachable')).toBeNull();
  });

  test('parseInterfacePrefix', () => {
    expect(parseInterfacePrefix(ADDR)).toBe(24);
    expect(parseInterfacePrefix('3: br0    inet 10.8.0.1/16 scope global br0')).toBe(16);
    expect(parseInterfacePrefix('')).toBeNull();
  });

  test('parseInterfaceBroadcasts', () => {
    const output = [
      '2: eth0    inet 192.168.1.10/24 brd 192.168.1.255 scope global eth0',
      '2: eth0    inet 10.0.0.1/8 brd 10.255.255.255 scope global eth0',
    ].join('\n');
    expect(parseInterfaceBroadcasts(output)).toEqual(['192.168.1.255', '10.255.255.255']);
    expect(parseInterfaceBroadcasts('3: br0    inet 10.8.0.1/16 scope global br0')).toEqual([]);
  });
});

describe('IpOwnershipManager', () => {
  test('detects the interface, prefix and broadcasts once', async () => {
    const executor = lan();
    const { owner, logger } = manager(executor);

    const binding = await owner.detectBinding();
    await owner.detectBinding();

    expect(binding).toEqual({ iface: 'eth0', prefixLength: 24, broadcasts: ['192.168.1.255'] });
    expect(executor.commands()).toEqual(['ip route get 192.168.1.50', 'ip -o -f inet addr show dev eth0']);
    expect(logger.lines).toContainEqual({ level: 'info', scope: 'test', message: 'Detected iface=eth0, cidr=/24' });
  });

  test('a configured prefix overrides the detected one', async () => {
    const { owner } = manager(lan(), 16);
    expect((await owner.detectBinding()).prefixLength).toBe(16);
  });

  test('fails detection without a route', async () => {
    const executor = new FakeExecutor().on('ip route get', {
      exitCode: 2,
      stderr: 'RTNETLINK answers: Network is unreachable\n',
    });
    const { owner } = manager(executor);

    const error = await owner.detectBinding().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(DetectionError);
    expect(error).toMatchObject({ code: 'NO_ROUTE', target: TARGET });
  });

  test('fails detection when the interface has no IPv4 address', async () => {
    const executor = new FakeExecutor().on('ip route get', { stdout: ROUTE });
    const { owner } = manager(executor);

    await expect(owner.detectBinding()).rejects.toMatchObject({ code: 'NO_INTERFACE_ADDRESS' });
  });

  test('claim adds the address and announces it', async () => {
    const executor = lan();
    const { owner, logger } = manager(executor);

    await owner.claim();

    expect(owner.claimed).toBe(true);
    expect(executor.commands().slice(2)).toEqual([
      'ip addr add 192.168.1.50/24 dev eth0',
      'arping -U -I eth0 -c 1 192.168.1.50',
      'arping -U -I eth0 -c 1 192.168.1.50',
    ]);
    expect(logger.lines.at(-1)).toEqual({ level: 'info', scope: 'test', message: 'Claimed IP 192.168.1.50/24 on eth0' });
  });

  test('claim is idempotent', async () => {
    const executor = lan();
    const { owner } = manager(executor);

    await owner.claim();
    const count = executor.calls.length;
    await owner.claim();

    expect(executor.calls.length).toBe(count);
  });

  test('an address that is already present counts as claimed', async () => {
    const executor = lan().on('ip addr add', { exitCode: 2, stderr: 'RTNETLINK answers: File exists\n' });
    const { owner } = manager(executor);

    await owner.claim();

    expect(owner.claimed).toBe(true);
  });

  test('a failed add rejects and leaves the address unclaimed', async () => {
    const executor = lan().on('ip addr add', { exitCode: 2, stderr: 'RTNETLINK answers: Operation not permitted\n' });
    const { owner } = manager(executor);

    const error = await owner.claim().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CommandError);
    expect(error).toMatchObject({
      code: 'COMMAND_FAILED',
      message: 'Failed to add 192.168.1.50/24 on eth0: RTNETLINK answers: Operation not permitted',
    });
    expect(owner.claimed).toBe(false);
    expect(executor.commands().some((line) => line.startsWith('arping'))).toBe(false);
  });

  test('announcement failures are only warnings', async () => {
    const executor = lan().on('arping', new Error('spawn arping ENOENT'));
    const { owner, logger } = manager(executor);

    await owner.claim();

    expect(owner.claimed).toBe(true);
    expect(logger.lines.filter((line) => line.level === 'warn')).toHaveLength(2);
  });

  test('release deletes the claimed address', async () => {
    const executor = lan();
    const { owner, logger } = manager(executor);
    await owner.claim();

    await owner.release();

    expect(owner.claimed).toBe(false);
    expect(executor.commands().at(-1)).toBe('ip addr del 192.168.1.50/24 dev eth0');
    expect(logger.lines.at(-1)?.message).toBe('Released IP 192.168.1.50/24 from eth0');
  });

  test('release without a claim runs nothing', async () => {
    const executor = lan();
    const { owner } = manager(executor);

    await owner.release();
    await owner.release();

    expect(executor.calls).toEqual([]);
  });

  test('an address that is already gone is a warning', async () => {
    const executor = lan().on('ip addr del', {
      exitCode: 2,
      stderr: 'RTNETLINK answers: Cannot assign requested address\n',
    });
    const { owner, logger } = manager(executor);
    await owner.claim();

    await owner.release();

    expect(owner.claimed).toBe(false);
    expect(logger.lines).toContainEqual({
      level: 'warn',
      scope: 'test',
      message: '192.168.1.50/24 already gone from eth0: RTNETLINK answers: Cannot assign requested address',
    });
  });

  test('release clears the claim even when the delete fails', async () => {
    const executor = lan().on('ip addr del', new Error('spawn ip EACCES'));
    const { owner, logger } = manager(executor);
    await owner.claim();

    await owner.release();

    expect(owner.claimed).toBe(false);
    expect(logger.lines).toContainEqual({
      level: 'error',
      scope: 'test',
      message: 'Failed to delete 192.168.1.50/24 from eth0: spawn ip EACCES',
    });
  });

  test('claim and release requested together run in order', async () => {
    const executor = lan();
    const { owner } = manager(executor);

    await Promise.all([owner.claim(), owner.release(), owner.claim()]);

    expect(owner.claimed).toBe(true);
    expect(executor.commands().filter((line) => line.startsWith('ip addr '))).toEqual([
      'ip addr add 192.168.1.50/24 dev eth0',
      'ip addr del 192.168.1.50/24 dev eth0',
      'ip addr add 192.168.1.50/24 dev eth0',
    ]);
  });

  test('broadcast addresses come from the interface when reported', async () => {
    const { owner } = manager(lan());
    expect(await owner.broadcastAddresses()).toEqual(['192.168.1.255']);
  });

  test('broadcast address is derived from the prefix otherwise', async () => {
    const executor = new FakeExecutor()
      .on('ip route get', { stdout: ROUTE })
      .on('ip -o -f inet addr show', { stdout: '2: eth0    inet 192.168.0.10/22 scope global eth0\n' });
    const { owner } = manager(executor);

    expect(await owner.broadcastAddresses()).toEqual(['192.168.3.255']);
  });
});
