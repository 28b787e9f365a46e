#!/usr/bin/env tsx
import { writeFile } from 'node:fs/promises'
import { pathToFileURL } from 'node:url'
import { parseArgs } from 'node:util'
import type { Coordinate, CoveragePlan } from '@/types/coverage'
import { createWorkerPool } from '@/utils/anglePool'
import { CoveragePlannerError, InvalidConfigError } from '@/utils/errors'
import { generateCSVExport, generateKMLExport, generateWaypointText } from '@/utils/exportUtils'
import { generateCoveragePath, generateCoveragePathParallel } from '@/utils/flightPlanGenerator'
import { readKMLFile } from '@/utils/kmlParser'

const OUTPUT_FORMATS = ['text', 'csv', 'kml'] as const
type OutputFormat = typeof OUTPUT_FORMATS[number]

export interface CliOptions {
  spacingM: number
  angleSamples: number
  kml?: string
  format: OutputFormat
  out?: string
  workers: number
  projected: boolean
}

// Small survey block used when no KML file is given
const DEMO_POLYGON: Coordinate[] = [
  { lat: 37.7749, lng: -122.4194 },
  { lat: 37.7749, lng: -122.4184 },
  { lat: 37.7740, lng: -122.4184 },
  { lat: 37.7740, lng: -122.4194 },
  { lat: 37.7741, lng: -122.4196 }
]

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value)
}

function parseNumber(flag: string, value: string): number {
  const parsed = Number(value)
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new InvalidConfigError(`--${flag} expects a number, got "${value}"`)
  }
  return parsed
}

export function parseCliOptions(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      spacing: { type: 'string', default: '10' },
      samples: { type: 'string', default: '36' },
      kml: { type: 'string' },
      format: { type: 'string', default: 'text' },
      out: { type: 'string' },
      workers: { type: 'string', default: '0' },
      projected: { type: 'boolean', default: false }
    },
    strict: true
  })

  const format = values.format ?? 'text'
  if (!isOutputFormat(format)) {
    throw new InvalidConfigError(`--format must be one of ${OUTPUT_FORMATS.join(', ')}, got "${format}"`)
  }

  const workers = parseNumber('workers', values.workers ?? '0')
  if (!Number.isInteger(workers) || workers < 0) {
    throw new InvalidConfigError(`--workers must be a non-negative integer, got ${workers}`)
  }

  return {
    spacingM: parseNumber('spacing', values.spacing ?? '10'),
    angleSamples: parseNumber('samples', values.samples ?? '36'),
    kml: values.kml,
    format,
    out: values.out,
    workers,
    projected: values.projected ?? false
  }
}

function renderPlan(plan: CoveragePlan, options: CliOptions, name: string): string {
  if (options.projected) {
    return plan.projectedPath.map(p => `${p.x.toFixed(3)},${p.y.toFixed(3)}`).join('\n')
  }
  switch (options.format) {
    case 'csv':
      return generateCSVExport(plan)
    case 'kml':
      return generateKMLExport(plan, name)
    case 'text':
      return generateWaypointText(plan)
  }
}

async function buildPlan(polygon: Coordinate[], options: CliOptions): Promise<CoveragePlan> {
  const config = { spacingM: options.spacingM, angleSamples: options.angleSamples }
  if (options.workers === 0) {
    return generateCoveragePath(polygon, config)
  }

  const pool = createWorkerPool(options.workers)
  try {
    return await generateCoveragePathParallel(polygon, config, pool)
  } finally {
    await pool.close()
  }
}

// Returns what the command prints
export async function runCli(argv: string[]): Promise<string> {
  const options = parseCliOptions(argv)

  const survey = options.kml ? await readKMLFile(options.kml) : undefined
  const polygon = survey?.coordinates ?? DEMO_POLYGON
  const name = survey?.name ?? 'Coverage Path'

  const plan = await buildPlan(polygon, options)
  const body = renderPlan(plan, options, name)
  const header = `Generated ${plan.waypoints.length} waypoints ` +
    `(heading ${plan.heading.toFixed(1)}°, ${plan.length.toFixed(1)} m):`

  if (options.out) {
    await writeFile(options.out, body + '\n', 'utf8')
    return `${header}\nSaved ${options.projected ? 'projected' : options.format} output to ${options.out}`
  }
  return `${header}\n${body}`
}

async function main(): Promise<void> {
  try {
    console.log(await runCli(process.argv.slice(2)))
  } catch (error) {
    if (error instanceof CoveragePlannerError) {
      console.error(`❌ ${error.name}: ${error.message}`)
    } else {
      console.error('❌ Failed to generate coverage path:', error)
    }
    process.exitCode = 1
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  void main()
}
