import { vi } from 'vitest'
import { TunnelError } from '../scripts/monitoring/errors.js'
import type { CommandRunner } from '../scripts/monitoring/ssh-exec.js'
import type { ServerDescriptor } from '../scripts/monitoring/types.js'

export type FakeRunner = CommandRunner & { commands: string[] }

/** Answers commands from a table; unknown commands fail like a non-zero exit. */
export function fakeRunner(outputs: Record<string, string>, endpoint = 'root@203.0.113.20'): FakeRunner {
  const commands: string[] = []
  return {
    endpoint,
    commands,
    async run(command: string) {
      commands.push(command)
      const out = outputs[command]
      if (out === undefined) throw new TunnelError('run command', 'exit status 7 (stderr: )')
      return out
    },
  }
}

/** Runner whose every call dies at the given stage. */
export function failingRunner(err: Error, endpoint = 'root@203.0.113.20'): CommandRunner {
  return {
    endpoint,
    run: async () => {
      throw err
    },
  }
}

export function descriptor(id: string, extra: Partial<ServerDescriptor> = {}): ServerDescriptor {
  return {
    id,
    name: id,
    icon: '🖥️',
    cloudName: 'Production',
    cloudIcon: '☁️',
    address: '10.0.1.11',
    services: [],
    ...extra,
  }
}

export function vector(...samples: Array<[string, string]>) {
  return {
    status: 'success',
    data: {
      resultType: 'vector',
      result: samples.map(([instance, value]) => ({ metric: { instance }, value: [1700000000, value] })),
    },
  }
}

/** Answers each query from `table` (keyed by PromQL); unknown queries get an empty vector. */
export function stubPrometheus(table: Record<string, unknown>) {
  const fetchMock = vi.fn(async (input: string | URL | Request) => {
    const url = new URL(String(input))
    if (url.pathname === '/-/healthy') return new Response('Prometheus is Healthy.', { status: 200 })
    const query = url.searchParams.get('query') ?? ''
    return Response.json(table[query] ?? vector())
  })
  vi.stubGlobal('fetch', fetchMock)
  return fetchMock
}

export function queriesOf(fetchMock: ReturnType<typeof stubPrometheus>): string[] {
  return fetchMock.mock.calls.map(([input]) => new URL(String(input)).searchParams.get('query') ?? '')
}

/** Metrics backend answers for one healthy node_exporter instance. */
export function healthyNode(instance: string, figures: { cpu: string; memory: string; disk: string; uptime: string }) {
  const i = `instance="${instance}"`
  return {
    [`up{${i},job="node"}`]: vector([instance, '1']),
    [`100 - avg(rate(node_cpu_seconds_total{mode="idle",${i}}[5m]))*100`]: vector([instance, figures.cpu]),
    [`(1 - node_memory_MemAvailable_bytes{${i}}/node_memory_MemTotal_bytes{${i}})*100`]: vector([instance, figures.memory]),
    [`node_memory_MemTotal_bytes{${i}}`]: vector([instance, '2147483648']),
    [`node_memory_MemAvailable_bytes{${i}}`]: vector([instance, '1288490189']),
    [`(1 - node_filesystem_avail_bytes{${i},mountpoint="/"}/node_filesystem_size_bytes{${i},mountpoint="/"})*100`]: vector([instance, figures.disk]),
    [`node_filesystem_size_bytes{${i},mountpoint="/"}`]: vector([instance, '10737418240']),
    [`node_filesystem_avail_bytes{${i},mountpoint="/"}`]: vector([instance, '6979321856']),
    [`node_time_seconds{${i}} - node_boot_time_seconds{${i}}`]: vector([instance, figures.uptime]),
  }
}
