import type { Handler, Hono, Context as HonoContext, MiddlewareHandler } from "hono"

export type Application = Hono
export type Router = Hono
export type Context = HonoContext
export type Middleware = MiddlewareHandler
export type RequestHandler = Handler
