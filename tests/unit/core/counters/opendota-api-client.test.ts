import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { createOpenDotaClient, matchupsUrl } from '@core/counters/opendota-api-client'
import { mockResponse } from '../test-helpers'

describe('OpenDotaClient', () => {
  const fetchMock = vi.fn()

  beforeEach(() => {
    fetchMock.mockReset()
    vi.stubGlobal('fetch', fetchMock)
  })

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('requests the matchups endpoint by hero id', async () => {
    fetchMock.mockResolvedValueOnce(mockResponse(200, '[]'))

    const client = createOpenDotaClient()
    const result = await client.fetch({ id: 2, displayName: 'Axe' })

    expect(result).toEqual({
      ok: true,
      value: { url: 'https://api.opendota.com/api/heroes/2/matchups', body: '[]' },
    })
    expect(fetchMock).toHaveBeenCalledWith(
      'https://api.opendota.com/api/heroes/2/matchups',
      expect.objectContaining({ headers: { Accept: 'application/json' } }),
    )
  })

  it('uses a custom base URL', async () => {
    fetchMock.mockResolvedValueOnce(mockResponse(200, '[]'))

    const client = createOpenDotaClient({ baseUrl: 'http://localhost:3000/api/' })
    await client.fetch({ id: 70, displayName: 'Ursa' })

    expect(fetchMock.mock.calls[0][0]).toBe('http://localhost:3000/api/heroes/70/matchups')
  })

  it('returns NotFound for an unknown hero id', async () => {
    fetchMock.mockResolvedValueOnce(mockResponse(404, '{"error":"Not Found"}', 'Not Found'))

    const client = createOpenDotaClient({ retries: 0 })
    const result = await client.fetch({ id: 999, displayName: 'Nobody' })

    expect(!result.ok && result.failure.kind).toBe('NotFound')
  })
})

describe('matchupsUrl', () => {
  it('joins base URLs with and without trailing slash', () => {
    expect(matchupsUrl('https://api.opendota.com/api', 1)).toBe(
      'https://api.opendota.com/api/heroes/1/matchups',
    )
    expect(matchupsUrl('https://api.opendota.com/api/', 1)).toBe(
      'https://api.opendota.com/api/heroes/1/matchups',
    )
  })
})
