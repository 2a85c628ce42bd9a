export { serializeExpensesCsv, parseExpensesCsv, stripBom } from './csv.js';
