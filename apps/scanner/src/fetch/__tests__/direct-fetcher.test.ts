import { afterEach, describe, expect, it, vi } from 'vitest'
import { ProxyAgent, Response, type RequestInit } from 'undici'
import { DirectFetcher, parseSetCookieHeaders } from '../direct-fetcher.js'
import { FakeClock, testSettings } from './helpers.js'

const URL = 'https://shop.example.com/cart.php?a=add&pid=5'

const fetchers: DirectFetcher[] = []

function makeFetcher(
  fetchFn: (url: string, init: RequestInit) => Promise<Response>,
  http = testSettings().http,
  clock = new FakeClock()
) {
  const fetcher = new DirectFetcher({ http, fetchFn, clock })
  fetchers.push(fetcher)
  return fetcher
}

afterEach(async () => {
  await Promise.all(fetchers.splice(0).map(fetcher => fetcher.close()))
})

describe('DirectFetcher', () => {
  it('sends the configured headers and the cached cookie', async () => {
    const fetchFn = vi.fn(async (_url: string, _init: RequestInit) => new Response('<html>ok</html>', { status: 200 }))
    const fetcher = makeFetcher(fetchFn)

    await fetcher.fetch(URL, { cookieHeader: 'cf_clearance=abc' })

    expect(fetchFn).toHaveBeenCalledTimes(1)
    expect(fetchFn.mock.calls[0]?.[0]).toBe(URL)
    expect(fetchFn.mock.calls[0]?.[1]).toMatchObject({
      method: 'GET',
      redirect: 'follow',
      headers: {
        'User-Agent': 'Mozilla/5.0',
        'Accept-Language': 'en-US,en;q=0.9',
        Cookie: 'cf_clearance=abc',
      },
    })
  })

  it('returns a successful result with lowercased headers', async () => {
    const fetcher = makeFetcher(
      async () => new Response('<html>VPS 1GB</html>', { status: 200, headers: { 'X-Cache': 'MISS' } })
    )

    const { result, cookies } = await fetcher.fetch(URL)

    expect(result).toMatchObject({
      ok: true,
      requestedUrl: URL,
      finalUrl: URL,
      statusCode: 200,
      body: '<html>VPS 1GB</html>',
      tier: 'direct',
      error: null,
    })
    expect(result.headers['x-cache']).toBe('MISS')
    expect(cookies).toEqual([])
  })

  it('reports non-success statuses without throwing', async () => {
    const fetcher = makeFetcher(async () => new Response('Not Found', { status: 404 }))

    const { result } = await fetcher.fetch(URL)

    expect(result.ok).toBe(false)
    expect(result.statusCode).toBe(404)
    expect(result.body).toBe('Not Found')
    expect(result.error).toBe('status=404')
  })

  it('hands back cookies from Set-Cookie', async () => {
    const clock = new FakeClock()
    const fetcher = makeFetcher(
      async () =>
        new Response('ok', {
          status: 200,
          headers: [
            ['set-cookie', 'cf_clearance=abc; Path=/; Domain=.example.com; Max-Age=3600'],
            ['set-cookie', 'lang=english; Path=/'],
          ],
        }),
      testSettings().http,
      clock
    )

    const { cookies } = await fetcher.fetch(URL)

    expect(cookies).toEqual([
      { name: 'cf_clearance', value: 'abc', domain: 'example.com', expiresAt: clock.now() + 3_600_000 },
      { name: 'lang', value: 'english', domain: null, expiresAt: null },
    ])
  })

  it('turns transport errors into network failures', async () => {
    const fetcher = makeFetcher(async () => {
      throw new TypeError('fetch failed', { cause: new Error('getaddrinfo ENOTFOUND shop.example.com') })
    })

    const { result } = await fetcher.fetch(URL)

    expect(result).toMatchObject({
      ok: false,
      statusCode: null,
      body: '',
      error: 'network:fetch failed: getaddrinfo ENOTFOUND shop.example.com',
    })
  })

  it('times out slow responses', async () => {
    const http = { ...testSettings().http, timeoutMs: 5 }
    const fetcher = makeFetcher(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')))
        }),
      http
    )

    const { result } = await fetcher.fetch(URL)

    expect(result.error).toBe('network:timeout after 5ms')
  })

  it('routes through a proxy agent when a proxy is given', async () => {
    const fetchFn = vi.fn(async (_url: string, _init: RequestInit) => new Response('ok', { status: 200 }))
    const fetcher = makeFetcher(fetchFn)

    await fetcher.fetch(URL, { proxyUrl: 'http://proxy.test:8080' })

    expect(fetchFn.mock.calls[0]?.[1].dispatcher).toBeInstanceOf(ProxyAgent)
  })

  it('does not follow redirects when disabled', async () => {
    const fetchFn = vi.fn(async (_url: string, _init: RequestInit) => new Response(null, { status: 302 }))
    const fetcher = makeFetcher(fetchFn, { ...testSettings().http, followRedirects: false })

    const { result } = await fetcher.fetch(URL)

    expect(fetchFn.mock.calls[0]?.[1].redirect).toBe('manual')
    expect(result.ok).toBe(true)
    expect(result.statusCode).toBe(302)
  })
})

describe('parseSetCookieHeaders', () => {
  it('turns deletions into null values', () => {
    const now = Date.UTC(2025, 0, 1)
    expect(parseSetCookieHeaders(['sid=; Max-Age=0', 'garbage'], now)).toEqual([
      { name: 'sid', value: null, domain: null },
    ])
  })
})
