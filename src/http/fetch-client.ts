import type {
  HttpClient,
  HttpJsonResponse,
  HttpRequest,
  HttpResponse,
} from './types.ts'

export const buildRequestUrl = (request: HttpRequest): string => {
  const url = new URL(request.url)
  for (const [key, value] of Object.entries(request.query ?? {})) {
    url.searchParams.set(key, value)
  }
  return url.toString()
}

const send = async (request: HttpRequest): Promise<HttpResponse> => {
  const response = await fetch(buildRequestUrl(request), {
    headers: { Accept: 'application/json, text/plain, */*' },
  })
  return {
    status: response.status,
    statusText: response.statusText,
    content: await response.text(),
  }
}

/**
 * HttpClient backed by the global fetch. JSON bodies are only parsed for
 * 200 responses; a malformed 200 body rejects.
 */
export const createFetchHttpClient = (): HttpClient => ({
  execute: send,
  executeJson: async <T>(
    request: HttpRequest,
    parse: (value: unknown) => T,
  ): Promise<HttpJsonResponse<T>> => {
    const response = await send(request)
    if (response.status !== 200) {
      return response
    }
    const value: unknown = JSON.parse(response.content)
    return { ...response, data: parse(value) }
  },
})
