import type { ProxyRuntime } from "../../../../packages/core/src/features/runtime/runtime.js"

export type ApiRouteOptions = {
  runtime: ProxyRuntime
}
