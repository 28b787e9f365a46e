import { readFile } from 'node:fs/promises'
import { XMLParser } from 'fast-xml-parser'
import type { Coordinate, KMLData } from '@/types/coverage'

type XMLNode = Record<string, unknown>

function isNode(value: unknown): value is XMLNode {
  return typeof value === 'object' && value !== null
}

function child(node: unknown, key: string): unknown {
  return isNode(node) ? node[key] : undefined
}

function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') return value
  if (typeof value === 'number') return String(value)
  // Elements with attributes keep their text under #text
  const text = child(value, '#text')
  return typeof text === 'string' || typeof text === 'number' ? String(text) : undefined
}

export function parseKML(content: string): KMLData {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    parseTagValue: false
  })

  const result: unknown = parser.parse(content)

  // Extract coordinates from KML structure
  const coordinates = extractCoordinates(result)

  if (coordinates.length === 0) {
    throw new Error('No valid coordinates found in KML file')
  }

  return {
    name: extractField(result, 'name'),
    description: extractField(result, 'description'),
    coordinates
  }
}

export async function readKMLFile(path: string): Promise<KMLData> {
  const content = await readFile(path, 'utf8')
  return parseKML(content)
}

function extractCoordinates(kmlData: unknown): Coordinate[] {
  const coordinates: Coordinate[] = []

  for (const placemark of findPlacemarks(kmlData)) {
    const ring = child(child(child(child(placemark, 'Polygon'), 'outerBoundaryIs'), 'LinearRing'), 'coordinates')
    const line = child(child(placemark, 'LineString'), 'coordinates')
    const coordString = textOf(ring) ?? textOf(line)
    if (coordString) {
      coordinates.push(...parseCoordinateString(coordString))
    }
  }

  return coordinates
}

function findPlacemarks(kmlData: unknown): XMLNode[] {
  const placemarks: XMLNode[] = []

  function searchForPlacemarks(obj: unknown) {
    if (!isNode(obj)) return

    const found = obj.Placemark
    for (const placemark of Array.isArray(found) ? found : [found]) {
      if (isNode(placemark)) placemarks.push(placemark)
    }

    // Recursively search nested objects
    for (const key in obj) {
      if (key !== 'Placemark') searchForPlacemarks(obj[key])
    }
  }

  searchForPlacemarks(kmlData)
  return placemarks
}

// KML tuples are longitude,latitude[,altitude], separated by any whitespace
function parseCoordinateString(coordString: string): Coordinate[] {
  const coordinates: Coordinate[] = []

  for (const tuple of coordString.trim().split(/\s+/)) {
    if (!tuple) continue

    const parts = tuple.split(',').map(part => part.trim())
    if (parts.length < 2) {
      console.warn(`⚠️ Failed to parse coordinates from: ${tuple}`)
      continue
    }

    const lng = parseFloat(parts[0])
    const lat = parseFloat(parts[1])

    if (isNaN(lat) || isNaN(lng)) {
      console.warn(`⚠️ Failed to parse coordinates from: ${tuple}`)
    } else if (lat < -90 || lat > 90 || lng < -180 || lng > 180) {
      console.warn(`⚠️ Invalid coordinates: lat=${lat}, lng=${lng}`)
    } else {
      coordinates.push({ lat, lng })
    }
  }

  return coordinates
}

// Document-level value first, then the first placemark that has one
function extractField(kmlData: unknown, field: 'name' | 'description'): string | undefined {
  const documentValue = textOf(child(child(child(kmlData, 'kml'), 'Document'), field))
  if (documentValue !== undefined) {
    return documentValue.trim()
  }

  for (const placemark of findPlacemarks(kmlData)) {
    const value = textOf(placemark[field])
    if (value !== undefined) {
      return value.trim()
    }
  }

  return undefined
}
