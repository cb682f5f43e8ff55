import { Point } from './Point';

export type JsonObject = { [key: string]: unknown };

/**
 * A single geocoding answer: a human-readable label, its coordinate and the
 * provider's untouched payload for that entry.
 */
export class Location {
  constructor(
    readonly label: string,
    readonly point: Point,
    readonly raw: JsonObject
  ) {
    Object.freeze(this);
  }

  get address(): string {
    return this.label;
  }

  get latitude(): number {
    return this.point.latitude;
  }

  get longitude(): number {
    return this.point.longitude;
  }

  get altitude(): number {
    return this.point.altitude;
  }

  toString(): string {
    return this.label;
  }

  toJSON(): { label: string; latitude: number; longitude: number; altitude: number } {
    return {
      label: this.label,
      latitude: this.latitude,
      longitude: this.longitude,
      altitude: this.altitude,
    };
  }
}
