export { extractPageSignals } from './extract'
