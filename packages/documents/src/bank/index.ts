export { getBankInfo, listBanks } from './bank.js';
