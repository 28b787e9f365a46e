import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, describe, expect, it } from 'vitest'
import { InvalidConfigError } from '@/utils/errors'
import { parseCliOptions, runCli } from './cli'

describe('parseCliOptions', () => {
  it('uses the demo defaults', () => {
    expect(parseCliOptions([])).toEqual({
      spacingM: 10,
      angleSamples: 36,
      kml: undefined,
      format: 'text',
      out: undefined,
      workers: 0,
      projected: false
    })
  })

  it('reads every flag', () => {
    expect(parseCliOptions([
      '--spacing', '7.5',
      '--samples', '12',
      '--kml', 'field.kml',
      '--format', 'csv',
      '--out', 'path.csv',
      '--workers', '4',
      '--projected'
    ])).toEqual({
      spacingM: 7.5,
      angleSamples: 12,
      kml: 'field.kml',
      format: 'csv',
      out: 'path.csv',
      workers: 4,
      projected: true
    })
  })

  it('rejects bad values', () => {
    expect(() => parseCliOptions(['--spacing', 'wide'])).toThrow(InvalidConfigError)
    expect(() => parseCliOptions(['--format', 'gpx'])).toThrow(InvalidConfigError)
    expect(() => parseCliOptions(['--workers=-1'])).toThrow(InvalidConfigError)
  })
})

describe('runCli', () => {
  let dir: string | undefined

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true })
    dir = undefined
  })

  it('plans the demo polygon and prints one line per waypoint', async () => {
    const output = await runCli(['--samples', '6'])
    const lines = output.split('\n')
    const match = /^Generated (\d+) waypoints \(heading [\d.]+°, [\d.]+ m\):$/.exec(lines[0])

    expect(match).not.toBeNull()
    expect(lines.length - 1).toBe(Number(match?.[1]))
    expect(lines[1]).toMatch(/^37\.77\d{4},-122\.41\d{4}$/)
  })

  it('writes a CSV export for a KML survey area', async () => {
    dir = await mkdtemp(join(tmpdir(), 'coverage-cli-'))
    const kmlFile = join(dir, 'field.kml')
    const outFile = join(dir, 'path.csv')
    await writeFile(kmlFile, `<kml><Document><name>Field</name><Placemark><Polygon><outerBoundaryIs><LinearRing>
      <coordinates>-122.4194,37.7749 -122.4184,37.7749 -122.4184,37.7740 -122.4194,37.7740 -122.4194,37.7749</coordinates>
    </LinearRing></outerBoundaryIs></Polygon></Placemark></Document></kml>`, 'utf8')

    const output = await runCli(['--kml', kmlFile, '--format', 'csv', '--out', outFile, '--samples', '4'])

    expect(output.split('\n')[1]).toBe(`Saved csv output to ${outFile}`)
    const csv = await readFile(outFile, 'utf8')
    expect(csv.startsWith('Waypoint,Latitude,Longitude\n1,')).toBe(true)
  })
})
