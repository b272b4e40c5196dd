export { provision } from './provision.js'
export { teardown } from './teardown.js'
