import type { HttpRequest, HttpResponse } from './parser.js'

export type RouteParams = Record<string, string>
export type RouteHandler = (req: HttpRequest, params: RouteParams) => HttpResponse | Promise<HttpResponse>

interface Route {
  method: string
  segments: string[]  // e.g. ['api', 'sessions', ':id']
  wildcard: boolean   // ends with *
  handler: RouteHandler
}

export type RouteMatch =
  | { kind: 'found'; handler: RouteHandler; params: RouteParams }
  | { kind: 'method-not-allowed'; allowed: string[] }
  | { kind: 'not-found' }

export class Router {
  private routes: Route[] = []

  add(method: string, pattern: string, handler: RouteHandler): void {
    const segments = pattern.split('/').filter(Boolean)
    const wildcard = segments[segments.length - 1] === '*'
    if (wildcard) segments.pop()

    this.routes.push({ method: method.toUpperCase(), segments, wildcard, handler })
  }

  /**
   * Finds the route for `method` and `path`. A path that exists under
   * other methods only reports which methods it accepts.
   */
  resolve(method: string, path: string): RouteMatch {
    let pathSegments: string[]
    try {
      pathSegments = path.split('/').filter(Boolean).map(decodeURIComponent)
    } catch {
      return { kind: 'not-found' }
    }
    const upperMethod = method.toUpperCase()
    const allowed: string[] = []

    for (const route of this.routes) {
      const params = matchRoute(route, pathSegments)
      if (params === null) continue
      if (route.method === upperMethod) {
        return { kind: 'found', handler: route.handler, params }
      }
      if (!allowed.includes(route.method)) allowed.push(route.method)
    }

    return allowed.length > 0 ? { kind: 'method-not-allowed', allowed } : { kind: 'not-found' }
  }
}

function matchRoute(route: Route, pathSegments: string[]): RouteParams | null {
  if (route.wildcard) {
    // Wildcard needs at least one segment past the fixed prefix
    if (pathSegments.length <= route.segments.length) return null
  } else if (pathSegments.length !== route.segments.length) {
    return null
  }

  const params: RouteParams = {}

  for (const [i, routeSeg] of route.segments.entries()) {
    const pathSeg = pathSegments[i]
    if (pathSeg === undefined) return null

    if (routeSeg.startsWith(':')) {
      params[routeSeg.slice(1)] = pathSeg
    } else if (routeSeg !== pathSeg) {
      return null
    }
  }

  if (route.wildcard) {
    params['*'] = pathSegments.slice(route.segments.length).join('/')
  }

  return params
}
