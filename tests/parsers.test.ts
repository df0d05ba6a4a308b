import { describe, it, expect } from 'vitest'
import {
  parseExporterText,
  parseNodeMetrics,
  parseDuration,
  parseKeyValueStatus,
} from '../scripts/monitoring/parsers.js'

const EXPORTER_TEXT = `# HELP node_load1 1m load average.
# TYPE node_load1 gauge
node_load1 0.35
# HELP node_memory_MemTotal_bytes Memory information field MemTotal_bytes.
node_memory_MemTotal_bytes 2e+09
node_memory_MemAvailable_bytes 1.5e+09
node_filesystem_size_bytes{device="tmpfs",fstype="tmpfs",mountpoint="/run"} 1e+08
node_filesystem_size_bytes{device="/dev/vda1",fstype="ext4",mountpoint="/"} 2e+10
node_filesystem_avail_bytes{device="tmpfs",fstype="tmpfs",mountpoint="/run"} 9e+07
node_filesystem_avail_bytes{device="/dev/vda1",fstype="ext4",mountpoint="/"} 1.5e+10
`

describe('parseExporterText', () => {
  it('skips comments and keeps labels', () => {
    const samples = parseExporterText(EXPORTER_TEXT)
    expect(samples).toHaveLength(7)
    expect(samples[3]).toEqual({
      name: 'node_filesystem_size_bytes',
      labels: { device: 'tmpfs', fstype: 'tmpfs', mountpoint: '/run' },
      value: 1e8,
    })
  })
})

describe('parseNodeMetrics', () => {
  it('reads memory, root disk and load', () => {
    expect(parseNodeMetrics(EXPORTER_TEXT)).toEqual({
      memoryUsedBytes: 5e8,
      memoryTotalBytes: 2e9,
      memoryUsedPercent: 25,
      diskUsedBytes: 5e9,
      diskTotalBytes: 2e10,
      diskUsedPercent: 25,
      load1: 0.35,
    })
  })

  it('leaves disk at zero when the root mount is missing', () => {
    const m = parseNodeMetrics('node_memory_MemTotal_bytes 100\nnode_memory_MemAvailable_bytes 40\n')
    expect(m.diskTotalBytes).toBe(0)
    expect(m.diskUsedPercent).toBe(0)
    expect(m.memoryUsedPercent).toBeCloseTo(60)
    expect(m.load1).toBe(0)
  })

  it('fails without the memory gauges', () => {
    expect(() => parseNodeMetrics('node_load1 1\n')).toThrow(/node_memory_MemTotal_bytes/)
    expect(() => parseNodeMetrics('')).toThrow()
  })
})

describe('parseDuration', () => {
  it('parses compound durations into milliseconds', () => {
    expect(parseDuration('72h3m5.2s')).toBeCloseTo(259_385_200, 3)
    expect(parseDuration('1m30s')).toBe(90_000)
    expect(parseDuration('250ms')).toBe(250)
    expect(parseDuration('0')).toBe(0)
  })

  it('returns null for anything that is not a duration', () => {
    expect(parseDuration('')).toBeNull()
    expect(parseDuration('3 days')).toBeNull()
    expect(parseDuration('12')).toBeNull()
  })
})

describe('parseKeyValueStatus', () => {
  it('picks SERVER, MODE and TABLE and ignores the rest', () => {
    const out = '  SERVER = primary\nMODE=vpn\nnoise line\nTABLE=main=backup\nUPTIME=5d\n'
    expect(parseKeyValueStatus(out)).toEqual({ server: 'primary', mode: 'vpn', table: 'main=backup' })
  })

  it('leaves missing keys empty', () => {
    expect(parseKeyValueStatus('MODE=direct')).toEqual({ server: '', mode: 'direct', table: '' })
  })
})
