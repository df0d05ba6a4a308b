/**
 * Exports all TypeBox schemas to JSON Schema files in schemas/.
 * Schemas with $id use that as filename; others use the export name.
 * Run via: npm run schemas
 */
import { writeFileSync, mkdirSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { Kind } from '@sinclair/typebox'

import * as health from '../src/health/index.js'
import * as agent from '../src/agent/index.js'
import * as gateway from '../src/gateway/index.js'
import * as metrics from '../src/metrics/index.js'
import * as config from '../src/config/index.js'
import * as webhook from '../src/webhook/index.js'
import * as http from '../src/http/index.js'

const __dirname = dirname(fileURLToPath(import.meta.url))
const SCHEMAS_DIR = join(__dirname, '..', 'schemas')

const modules: Record<string, Record<string, unknown>> = {
  health,
  agent,
  gateway,
  metrics,
  config,
  webhook,
  http,
}

let exportedCount = 0

for (const [moduleName, exports] of Object.entries(modules)) {
  for (const [exportName, schema] of Object.entries(exports)) {
    // Skip plain values and type-only names
    if (!schema || typeof schema !== 'object' || !(Kind in schema)) continue

    const id = '$id' in schema && typeof schema.$id === 'string' ? schema.$id : exportName
    const outPath = join(SCHEMAS_DIR, moduleName, `${id}.json`)
    mkdirSync(dirname(outPath), { recursive: true })
    writeFileSync(outPath, JSON.stringify({ ...schema, $id: id }, null, 2) + '\n')
    exportedCount++
  }
}

console.log(`Exported ${exportedCount} schemas to ${SCHEMAS_DIR}`)
