/**
 * @brdocs/documents
 *
 * Validators, formatters, generators and lookups for Brazilian documents:
 * CPF, CNPJ, PIS/PASEP, voter ID, CNH, CEP, phone numbers, vehicle plates,
 * payment cards and bank codes.
 *
 * Validators never throw on malformed input. Generators validate their
 * options and accept a `RandomSource` for reproducible output.
 *
 * @packageDocumentation
 */

export * from './cpf/index.js';
export * from './cnpj/index.js';
export * from './pis/index.js';
export * from './voter-id/index.js';
export * from './cnh/index.js';
export * from './cep/index.js';
export * from './phone/index.js';
export * from './plate/index.js';
export * from './card/index.js';
export * from './bank/index.js';
