import { describe, it, expect, vi } from 'vitest'
import { RemoteAgentClient, createAgentClients } from '../scripts/monitoring/agent-client.js'
import { JumpHostClient } from '../scripts/monitoring/jump-host-client.js'
import { TunnelError } from '../scripts/monitoring/errors.js'
import { fakeRunner } from './helpers.js'

const STATUS = JSON.stringify({ mode: 'warp', uptime: '1h2m', connections: 3 })

describe('RemoteAgentClient', () => {
  it('reads status through curl on the agent port', async () => {
    const runner = fakeRunner({ 'curl -s http://127.0.0.1:9191/status': STATUS })
    const client = new RemoteAgentClient('Primary', 9191, runner)

    expect(await client.getStatus()).toEqual({ mode: 'warp', uptime: '1h2m', connections: 3 })
    expect(client.stats.snapshot()).toMatchObject({ endpoint: 'root@203.0.113.20', successCount: 1, errorCount: 0 })
  })

  it('asks for the mode check with a quoted URL', async () => {
    const checked = JSON.stringify({ mode: 'home', mode_healthy: false, mode_error: 'probe timed out' })
    const runner = fakeRunner({ "curl -s 'http://127.0.0.1:9090/status?check=true'": checked })
    const status = await new RemoteAgentClient('Primary', 9090, runner).getStatusWithCheck()
    expect(status.mode_healthy).toBe(false)
    expect(status.mode_error).toBe('probe timed out')
  })

  it('raises a parse-stage tunnel error on bad output', async () => {
    const runner = fakeRunner({ 'curl -s http://127.0.0.1:9090/status': 'curl: (7) Failed to connect' })
    const pending = new RemoteAgentClient('Primary', 9090, runner).getStatus()
    await expect(pending).rejects.toBeInstanceOf(TunnelError)
    await expect(pending).rejects.toMatchObject({ stage: 'parse output' })
  })

  it('rejects JSON without a mode', async () => {
    const runner = fakeRunner({ 'curl -s http://127.0.0.1:9090/status': '{"uptime":"1h"}' })
    await expect(new RemoteAgentClient('Primary', 9090, runner).getStatus())
      .rejects.toThrow('parse output: parse status: unexpected shape')
  })

  it('counts command failures in the stats', async () => {
    const client = new RemoteAgentClient('Primary', 9090, fakeRunner({}))
    await expect(client.getStatus()).rejects.toThrow('run command: exit status 7')
    expect(client.stats.snapshot()).toMatchObject({ successCount: 0, errorCount: 1, lastError: 'run command: exit status 7 (stderr: )' })
  })

  it('scrapes node metrics from the exporter port', async () => {
    const runner = fakeRunner({
      'curl -s http://127.0.0.1:9100/metrics': 'node_memory_MemTotal_bytes 400\nnode_memory_MemAvailable_bytes 100\nnode_load1 0.5\n',
    })
    const node = await new RemoteAgentClient('Primary', 9090, runner).getNodeMetrics()
    expect(node.memoryUsedBytes).toBe(300)
    expect(node.memoryUsedPercent).toBe(75)
    expect(node.load1).toBe(0.5)
  })

  it('wraps an unusable exporter page in a parse-stage error', async () => {
    const runner = fakeRunner({ 'curl -s http://127.0.0.1:9100/metrics': '' })
    await expect(new RemoteAgentClient('Primary', 9090, runner).getNodeMetrics())
      .rejects.toMatchObject({ stage: 'parse output' })
  })

  it('reads the egress address through the local SOCKS proxy', async () => {
    const runner = fakeRunner({ 'curl -s -x socks5h://127.0.0.1:18388 --max-time 10 ifconfig.me': '192.0.2.44\n' })
    expect(await new RemoteAgentClient('Primary', 9090, runner).getExternalIp()).toBe('192.0.2.44')
  })

  it('restarts the agent unit', async () => {
    const runner = fakeRunner({ 'systemctl restart switch-gate': '' })
    await new RemoteAgentClient('Primary', 9090, runner).restart()
    expect(runner.commands).toEqual(['systemctl restart switch-gate'])
  })
})

describe('createAgentClients', () => {
  const upstreams = [
    { key: 'primary', name: 'Primary', ip: '203.0.113.20', user: 'root', agent: true, agentPort: 9090 },
    { key: 'backup', name: 'Backup', ip: '203.0.113.30', user: 'root', agent: false, agentPort: 9090 },
  ]

  it('builds clients only for agent-flagged upstreams', () => {
    vi.stubEnv('SSH_AUTH_SOCK', '/tmp/test-agent.sock')
    const clients = createAgentClients(upstreams, { host: 'master@edge.example.net' })
    expect([...clients.keys()]).toEqual(['primary'])
    expect(clients.get('primary')?.stats.snapshot().endpoint).toBe('edge.example.net → root@203.0.113.20')
  })

  it('skips upstreams whose auth cannot be loaded', () => {
    vi.stubEnv('SSH_AUTH_SOCK', '')
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const clients = createAgentClients(upstreams, { host: 'edge.example.net', keyPath: '/nonexistent/id_ed25519' })
    expect(clients.size).toBe(0)
    expect(warn).toHaveBeenCalledTimes(1)
  })
})

describe('JumpHostClient', () => {
  const traffic = {
    timestamp: '2026-01-15T10:00:00Z',
    interfaces: { eth0: { name: 'eth0', tx_bytes: 1048576, tx_mb: 1 } },
    summary: { direct_mb: 1, vpn_mb: 0, total_mb: 1, total_gb: 0.001 },
    billing: { free_quota_gb: 100, billable_gb: 0, rate_rub_per_gb: 1.5, cost_rub: 0 },
  }

  function client(outputs: Record<string, string>) {
    return new JumpHostClient('Edge Gateway', fakeRunner(outputs, 'root@edge.example.net'), '/opt/vpn-mode.sh', '/opt/traffic.sh')
  }

  it('parses the status script output', async () => {
    const jump = client({ '/opt/vpn-mode.sh status': 'SERVER=primary\nMODE=vpn\nTABLE=vpn_route\n' })
    expect(await jump.getGatewayStatus()).toEqual({ server: 'primary', mode: 'vpn', table: 'vpn_route' })
  })

  it('validates traffic JSON', async () => {
    expect(await client({ '/opt/traffic.sh': JSON.stringify(traffic) }).getTraffic()).toEqual(traffic)
    await expect(client({ '/opt/traffic.sh': 'oops' }).getTraffic()).rejects.toThrow(/^parse output: parse traffic: /)
    await expect(client({ '/opt/traffic.sh': '{}' }).getTraffic()).rejects.toThrow('parse output: parse traffic: unexpected shape')
  })

  it('trims the external address', async () => {
    const jump = client({ 'curl -s --max-time 5 api.ipify.org': '198.51.100.7\n' })
    expect(await jump.getExternalIp()).toBe('198.51.100.7')
    expect(jump.stats.snapshot()).toMatchObject({ endpoint: 'root@edge.example.net', successCount: 1 })
  })
})
