import type { CoveragePlan } from '@/types/coverage'

function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;')
}

// One "lat,lng" line per waypoint
export function generateWaypointText(plan: CoveragePlan): string {
  return plan.waypoints
    .map(coord => `${coord.lat.toFixed(6)},${coord.lng.toFixed(6)}`)
    .join('\n')
}

export function generateCSVExport(plan: CoveragePlan): string {
  const csvHeader = 'Waypoint,Latitude,Longitude\n'

  const csvRows = plan.waypoints.map((coord, waypointIndex) => [
    waypointIndex + 1,
    coord.lat.toFixed(6),
    coord.lng.toFixed(6)
  ].join(','))

  return csvHeader + csvRows.join('\n')
}

// Single LineString placemark, KML coordinate order is lng,lat,alt
export function generateKMLExport(plan: CoveragePlan, name: string = 'Coverage Path'): string {
  const coordinates = plan.waypoints
    .map(coord => `${coord.lng.toFixed(7)},${coord.lat.toFixed(7)},0`)
    .join('\n          ')

  return `<?xml version="1.0" encoding="UTF-8"?>
<kml xmlns="http://www.opengis.net/kml/2.2">
  <Document>
    <name>${escapeXml(name)}</name>
    <ExtendedData>
      <Data name="sweepHeading">
        <value>${plan.heading.toFixed(1)}</value>
      </Data>
      <Data name="pathLength">
        <value>${plan.length.toFixed(1)}</value>
      </Data>
      <Data name="waypointCount">
        <value>${plan.waypoints.length}</value>
      </Data>
    </ExtendedData>
    <Placemark>
      <name>${escapeXml(name)}</name>
      <LineString>
        <tessellate>1</tessellate>
        <coordinates>
          ${coordinates}
        </coordinates>
      </LineString>
    </Placemark>
  </Document>
</kml>`
}
