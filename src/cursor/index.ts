export { createCursor } from './cursor.js'
export type { StreamCursor } from '../types/cursor.js'
