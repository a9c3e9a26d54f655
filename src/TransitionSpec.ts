import * as yup from "yup";
import * as _ from "lodash";
import { isRecord, isSymbol } from "./parser-utils";

/** The distinguished empty symbol of lambda/epsilon transitions. */
export const EPSILON = '';

export interface State {
  id: string;
  isInitial: boolean;
  isFinal: boolean;
}

export type DFATransition = { from: string, read: string, to: string };

export type TransitionLUT<T extends DFATransition> = (from: string, symbol: string) => T | undefined;

let SymbolSchema = yup
  .string()
  .test(
    'single character',
    '${path} must be a single character',
    (value) => value === undefined || isSymbol(value));

let StateListSchema = yup
  .array(yup.string().required('${path} must be a state id'))
  .required('${path} is required');

/** `"state,symbol"` -> target state id */
let TransitionMapSchema = yup
  .mixed<Record<string, string>>((value): value is Record<string, string> =>
    isRecord(value) && _.every(value, _.isString))
  .required('${path} is required')
  .typeError('${path} must map "state,symbol" keys to state ids');

export let NativeDocumentSchema = yup.object({
  alphabet: yup
    .array(SymbolSchema.required('${path} must be a single character'))
    .required('${path} is required'),

  states: StateListSchema,

  // "" stands for "no initial state"
  initial_state: yup
    .string()
    .defined('${path} is required'),

  final_states: StateListSchema,

  transitions: TransitionMapSchema,
});

export type NativeDocument = yup.InferType<typeof NativeDocumentSchema>;

export let JflapStateSchema = yup.object({
  id: yup.string().required('state ${path} is required'),
  name: yup.string(),
  initial: yup.boolean().default(false),
  final: yup.boolean().default(false),
});

export type JflapState = yup.InferType<typeof JflapStateSchema>;

export let JflapTransitionSchema = yup.object({
  from: yup.string().required('transition ${path} is required'),
  to: yup.string().required('transition ${path} is required'),
  // absent read symbol = epsilon
  read: yup
    .string()
    .default(EPSILON)
    .test(
      'single character or epsilon',
      'transition ${path} must be empty or a single character',
      (value) => value === EPSILON || isSymbol(value)),
});

export type JflapTransition = yup.InferType<typeof JflapTransitionSchema>;
