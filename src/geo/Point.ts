export type PointTuple = readonly [number, number] | readonly [number, number, number];

/**
 * Anything a reverse lookup accepts as its query.
 */
export type PointLike = Point | PointTuple | string;

/**
 * A bounding box as two opposite corners or as flat `[lat1, lon1, lat2, lon2]`.
 */
export type BoundsLike = readonly [PointLike, PointLike] | readonly [number, number, number, number];

const NUMBER = '([-+]?(?:\\d+(?:\\.\\d*)?|\\.\\d+))';
const SEPARATOR = '\\s*[,;\\s]\\s*';
const POINT_PATTERN = new RegExp(
  `^\\s*${NUMBER}\\s*°?\\s*([NSns])?${SEPARATOR}${NUMBER}\\s*°?\\s*([EWew])?(?:${SEPARATOR}${NUMBER})?\\s*$`
);

/**
 * Write a coordinate for use in a URL. Small magnitudes get fixed decimals
 * because `String(0.0000001)` would produce exponent notation.
 */
export function formatCoordinate(value: number): string {
  if (Math.abs(value) >= 1) {
    return String(value);
  }
  return value.toFixed(7);
}

function normalizeLongitude(longitude: number): number {
  if (Math.abs(longitude) <= 180) {
    return longitude;
  }
  const wrapped = (((longitude + 180) % 360) + 360) % 360;
  return wrapped - 180;
}

/**
 * Immutable geographic coordinate in decimal degrees, with altitude in km.
 */
export class Point {
  readonly latitude: number;
  readonly longitude: number;
  readonly altitude: number;

  constructor(latitude: number, longitude: number, altitude = 0) {
    for (const [name, value] of [['latitude', latitude], ['longitude', longitude], ['altitude', altitude]] as const) {
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new TypeError(`Point ${name} must be a finite number, got ${String(value)}`);
      }
    }
    if (Math.abs(latitude) > 90) {
      throw new RangeError(`Latitude must be in the [-90; 90] range, got ${latitude}`);
    }

    this.latitude = latitude;
    this.longitude = normalizeLongitude(longitude);
    this.altitude = altitude;
    Object.freeze(this);
  }

  static from(value: PointLike): Point {
    if (value instanceof Point) {
      return value;
    }
    if (typeof value === 'string') {
      return Point.parse(value);
    }
    if (value.length === 3) {
      return new Point(value[0], value[1], value[2]);
    }
    if (value.length === 2) {
      return new Point(value[0], value[1]);
    }
    throw new TypeError('Expected a Point, a [latitude, longitude] pair or a "latitude,longitude" string');
  }

  /**
   * Parse `"lat,lon"`, `"lat lon"` or `"lat; lon"`, optionally followed by an
   * altitude, with optional degree signs and hemisphere letters
   * (`"41.5 N, 81.0 W"`).
   */
  static parse(text: string): Point {
    const match = POINT_PATTERN.exec(text);
    if (!match) {
      throw new TypeError(`Failed to create Point instance from string: unknown format "${text}"`);
    }
    const [, lat, latHemisphere, lon, lonHemisphere, alt] = match;

    let latitude = Number(lat);
    let longitude = Number(lon);
    if (latHemisphere && latHemisphere.toUpperCase() === 'S') latitude = -latitude;
    if (lonHemisphere && lonHemisphere.toUpperCase() === 'W') longitude = -longitude;

    return new Point(latitude, longitude, alt === undefined ? 0 : Number(alt));
  }

  equals(other: Point, tolerance = 0): boolean {
    return (
      Math.abs(this.latitude - other.latitude) <= tolerance &&
      Math.abs(this.longitude - other.longitude) <= tolerance &&
      Math.abs(this.altitude - other.altitude) <= tolerance
    );
  }

  /**
   * Substitute `{lat}`, `{lon}` and `{alt}` in the template.
   */
  format(template: string): string {
    return template
      .replace(/\{lat\}/g, formatCoordinate(this.latitude))
      .replace(/\{lon\}/g, formatCoordinate(this.longitude))
      .replace(/\{alt\}/g, formatCoordinate(this.altitude));
  }

  toArray(): [number, number, number] {
    return [this.latitude, this.longitude, this.altitude];
  }

  toString(): string {
    return this.format('{lat},{lon}');
  }
}
