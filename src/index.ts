export { default as Automaton } from './Automaton';
export type { AddTransitionOptions, TransitionTableRow, TransitionTableView } from './Automaton';
export * from './AutomatonError';
export { closureSymbols, generateClosure, kleeneClosure, positiveClosure, projectedSize } from './closure';
export type { ClosureOptions } from './closure';
export { getConfig, loadConfig, setConfig, LOG_LEVELS } from './config';
export type { EngineConfig, LogLevel } from './config';
export { default as DFA } from './DFA';
export { default as InputTape, formatTape } from './InputTape';
export { loadJflap } from './jflap-format';
export { createLogger } from './logger';
export type { Logger } from './logger';
export { loadNative, saveNative, toNativeDocument } from './native-format';
export {
  accept,
  buildTrace,
  currentConfig,
  describeTrace,
  highlightPosition,
  isLastStep,
  next,
  prev,
  resetIndex,
} from './simulator';
export type { Configuration, SimulationTrace } from './simulator';
export { StateAutomaton } from './StateAutomaton';
export { default as StateGraph } from './state-diagram/StateGraph';
export type { LayoutEdge, OutTransition, Vertex, VertexLUT } from './state-diagram/StateGraph';
export { compute } from './substrings';
export type { Decomposition } from './substrings';
export { EPSILON } from './TransitionSpec';
export type { DFATransition, NativeDocument, State, TransitionLUT } from './TransitionSpec';
export { default as Workspace, attempt } from './Workspace';
export type { Result, TracePosition } from './Workspace';
