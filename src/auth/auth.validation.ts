import { addressBody } from '../services/ledger/ledger.validation';

export const issueTokenValidation = [addressBody('address')];
