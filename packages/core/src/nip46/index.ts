export {
  NIP46_METHODS,
  Nip46RequestSchema,
  Nip46ResponseSchema,
  createNip46Request,
  parseNip46Request,
  respondToNip46Command,
  parseNip46Response,
  getNip46Result,
  parseSignEventResult,
  type Nip46Method,
  type Nip46Request,
  type Nip46Response,
  type Nip46Command,
  type Nip46SignerOptions,
} from './nip46.js';
