export { ModuleGraph } from './module-graph.ts'
