/**
 * End-to-end runs of the command line, in process. Name resolution goes
 * through a fake prober so nothing touches the network.
 */
import fs from 'fs';
import os from 'os';
import path from 'path';
import { runCli } from '../src/run';
import type { CliDeps } from '../src/run';
import { FakeProber } from './helpers';

interface Captured {
  stdout: string;
  stderr: string;
  prober: FakeProber;
}

const HOSTS = { 'example.test': '192.0.2.10', 'mail.example.test': '192.0.2.25' };

describe('tlsaudit', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tlsaudit-cli-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function setup(env: NodeJS.ProcessEnv = {}): { deps: CliDeps; out: Captured } {
    const out: Captured = { stdout: '', stderr: '', prober: new FakeProber(HOSTS) };
    const deps: CliDeps = {
      cwd: tmpDir,
      env,
      color: false,
      createProber: () => out.prober,
      stdout: text => { out.stdout += text; },
      stderr: text => { out.stderr += text; },
    };
    return { deps, out };
  }

  it('prints the availability of each target', async () => {
    const { deps, out } = setup();
    const result = await runCli(['example.test', 'nowhere.test:8443'], deps);

    expect(result.exitCode).toBe(0);
    expect(out.stderr).toBe('');
    expect(out.stdout.split('\n')).toEqual([
      '',
      ' CHECKING HOST(S) AVAILABILITY',
      ' -----------------------------',
      '',
      `   ${'example.test:443'.padEnd(37)} => 192.0.2.10`,
      `   ${'nowhere.test:8443'.padEnd(37)} => WARNING: Could not resolve nowhere.test; discarding corresponding tasks.`,
      '',
      '',
    ]);
  });

  it('prints nothing with --quiet', async () => {
    const { deps, out } = setup();
    const result = await runCli(['--quiet', 'example.test'], deps);
    expect(result.exitCode).toBe(0);
    expect(out.stdout).toBe('');
    expect(result.resolution?.descriptors).toHaveLength(1);
  });

  it('rejects conflicting output sinks before resolving anything', async () => {
    const { deps, out } = setup();
    const result = await runCli(['--quiet', '--xml_out', '-', 'example.test'], deps);

    expect(result.exitCode).toBe(1);
    expect(out.stderr).toBe('  Command line error: Cannot use --quiet with --xml_out -.\n  Use -h for help.\n');
    expect(out.prober.requests).toHaveLength(0);
  });

  it('deduces the StartTLS protocol from the port', async () => {
    const { deps } = setup();
    const result = await runCli(['--starttls', 'auto', 'mail.example.test:587'], deps);
    expect(result.resolution?.descriptors[0]?.tlsWrappedProtocol).toBe('starttls_smtp');
  });

  it('expands --regular and scans port 443 over HTTPS', async () => {
    const { deps, out } = setup();
    const result = await runCli(['--regular', 'example.test'], deps);

    expect(result.resolved?.options.sslv3).toBe(true);
    expect(result.resolved?.options.http_get).toBe(true);
    expect(result.resolved?.options.regular).toBe(false);
    expect(out.stdout).toContain(`   ${'example.test:443'.padEnd(37)} => 192.0.2.10 (https)\n`);
  });

  it('aborts when --xmpp_to is used without XMPP', async () => {
    const { deps, out } = setup();
    const result = await runCli(['--xmpp_to', 'chat.example.test', 'example.test'], deps);
    expect(result.exitCode).toBe(1);
    expect(out.stdout).toBe('');
    expect(out.stderr).toBe(
      '  Command line error: Can only specify xmpp_to for the XMPP StartTLS protocol.\n  Use -h for help.\n',
    );
  });

  it('reads targets from a file', async () => {
    const targetsFile = path.join(tmpDir, 'targets.txt');
    fs.writeFileSync(targetsFile, '# servers\nexample.test\n\nmail.example.test:465\n');
    const { deps } = setup();
    const result = await runCli(['--targets_in', targetsFile], deps);
    expect(result.resolved?.targets).toEqual(['example.test', 'mail.example.test:465']);
    expect(result.resolution?.descriptors.map(d => d.port)).toEqual([443, 465]);
  });

  it('fails on an unknown flag', async () => {
    const { deps, out } = setup();
    const result = await runCli(['--bogus', 'example.test'], deps);
    expect(result.exitCode).toBe(1);
    expect(out.stderr).toContain("unknown option '--bogus'");
  });

  it('prints help with the option groups', async () => {
    const { deps, out } = setup();
    const result = await runCli(['--help'], deps);
    expect(result.exitCode).toBe(0);
    expect(out.stdout).toContain('Connectivity options:');
    expect(out.stdout).toContain('--regular');
  });

  it('takes timeout defaults from the rc file', async () => {
    fs.writeFileSync(path.join(tmpDir, '.tlsauditrc.json'), JSON.stringify({ timeout: 12 }));
    const { deps } = setup();
    const result = await runCli(['example.test'], deps);
    expect(result.resolved?.config.timeoutSeconds).toBe(12);
  });

  it('lets the command line override the rc file', async () => {
    fs.writeFileSync(path.join(tmpDir, '.tlsauditrc.json'), JSON.stringify({ timeout: 12 }));
    const { deps } = setup();
    const result = await runCli(['--timeout', '3', 'example.test'], deps);
    expect(result.resolved?.config.timeoutSeconds).toBe(3);
  });

  it('rejects a retry count of zero from the environment', async () => {
    const { deps, out } = setup({ TLSAUDIT_NB_RETRIES: '0' });
    const result = await runCli(['example.test'], deps);
    expect(result.exitCode).toBe(1);
    expect(out.stderr).toBe(
      '  Command line error: Cannot have a number smaller than 1 for --nb_retries.\n  Use -h for help.\n',
    );
  });

  it('registers flags from configured plugins', async () => {
    fs.mkdirSync(path.join(tmpDir, 'plugins'));
    fs.writeFileSync(
      path.join(tmpDir, 'plugins', 'extra.js'),
      [
        'module.exports = {',
        "  getTitle: () => 'ExtraPlugin',",
        "  getDescription: () => 'Extra checks.',",
        "  getCliOptions: () => [{ flags: '--extra', description: 'Run the extra check.' }],",
        '};',
      ].join('\n'),
    );
    fs.writeFileSync(path.join(tmpDir, '.tlsauditrc.json'), JSON.stringify({ plugins: ['plugins/*.js'] }));
    const { deps } = setup();
    const result = await runCli(['--extra', 'example.test'], deps);
    expect(result.exitCode).toBe(0);
    expect(result.resolved?.options.extra).toBe(true);
  });

  it('discards IPv6 targets when the host has no IPv6 support', async () => {
    const { deps } = setup();
    const result = await runCli(['[2001:db8::1]:443', 'example.test'], { ...deps, ipv6Supported: false });
    expect(result.exitCode).toBe(0);
    expect(result.resolution?.descriptors.map(d => d.hostname)).toEqual(['example.test']);
    expect(result.resolution?.failures.map(f => f.reason.message)).toEqual(['IPv6 is not supported on this platform']);
  });
});
