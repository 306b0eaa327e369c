import { nova } from './nova'
import { local } from './local'
import { custom } from './custom'

export const configs = {
  nova,
  local,
  custom,
}
