import type { FastifyBaseLogger } from 'fastify'
import { z } from 'zod'
import type { Coordinates, Shop } from '../types'
import type { Store } from '../repositories/types'
import { isValidCoordinates } from './geo'

export interface Geocoder {
  geocode(query: string): Promise<Coordinates | null>
}

export interface ReverseGeocoder {
  /** Human-readable address of a point, null when nothing is there */
  reverse(coordinates: Coordinates): Promise<string | null>
}

const NominatimResponseSchema = z.array(
  z.object({
    lat: z.coerce.number(),
    lon: z.coerce.number(),
  })
)

// Nominatim answers an unknown point with { error } and no display_name
const NominatimReverseSchema = z.object({
  display_name: z.string().optional(),
})

/**
 * Geocoder backed by the Nominatim search and reverse endpoints
 */
export class NominatimGeocoder implements Geocoder, ReverseGeocoder {
  constructor(
    private readonly baseUrl: string,
    private readonly userAgent: string = 'receipt-rewards-backend',
    private readonly timeoutMs: number = 10_000
  ) {}

  async geocode(query: string): Promise<Coordinates | null> {
    const url = new URL('/search', this.baseUrl)
    url.searchParams.set('q', query)
    url.searchParams.set('format', 'json')
    url.searchParams.set('limit', '1')

    const [first] = NominatimResponseSchema.parse(await this.request(url))
    return first ? { latitude: first.lat, longitude: first.lon } : null
  }

  async reverse(coordinates: Coordinates): Promise<string | null> {
    const url = new URL('/reverse', this.baseUrl)
    url.searchParams.set('lat', String(coordinates.latitude))
    url.searchParams.set('lon', String(coordinates.longitude))
    url.searchParams.set('format', 'json')

    const { display_name: address } = NominatimReverseSchema.parse(await this.request(url))
    return address?.trim() || null
  }

  private async request(url: URL): Promise<unknown> {
    const response = await fetch(url, {
      headers: { 'User-Agent': this.userAgent, Accept: 'application/json' },
      signal: AbortSignal.timeout(this.timeoutMs),
    })
    if (!response.ok) {
      throw new Error(`Geocoder responded with ${response.status}`)
    }
    return response.json()
  }
}

export interface GeocodingOptions {
  batchSize?: number
  /** Shops are skipped after this many failed lookups */
  maxAttempts?: number
}

export interface BackfillResult {
  attempted: number
  geocoded: number
}

/**
 * Fills in coordinates for shops created without them
 */
export class ShopGeocodingService {
  private readonly batchSize: number
  private readonly maxAttempts: number

  constructor(
    private readonly store: Store,
    private readonly geocoder: Geocoder,
    private readonly logger: FastifyBaseLogger,
    options: GeocodingOptions = {}
  ) {
    this.batchSize = options.batchSize ?? 20
    this.maxAttempts = options.maxAttempts ?? 3
  }

  async backfill(limit: number = this.batchSize): Promise<BackfillResult> {
    const shops = await this.store.shops.listMissingCoordinates(limit, this.maxAttempts)
    let geocoded = 0

    for (const shop of shops) {
      if (await this.geocodeShop(shop)) geocoded++
    }

    if (shops.length > 0) {
      this.logger.info({ attempted: shops.length, geocoded }, 'Shop geocoding backfill finished')
    }
    return { attempted: shops.length, geocoded }
  }

  private async geocodeShop(shop: Shop): Promise<boolean> {
    const query = shop.address ? `${shop.name}, ${shop.address}` : shop.name

    try {
      const coordinates = await this.geocoder.geocode(query)
      if (coordinates && isValidCoordinates(coordinates)) {
        await this.store.shops.setCoordinatesIfMissing(shop.id, coordinates)
        this.logger.debug({ shopId: shop.id, query, coordinates }, 'Shop geocoded')
        return true
      }
    } catch (error) {
      this.logger.warn({ err: error, shopId: shop.id, query }, 'Geocoding request failed')
    }

    await this.store.shops.recordGeocodeAttempt(shop.id)
    return false
  }
}
