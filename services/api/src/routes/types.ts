import type { Services } from '../services'

export interface RouteDeps {
  services: Services
  pageSize: number
}
