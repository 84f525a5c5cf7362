export { ResultPaginator } from './paginator.js';
export type { PaginatedClient } from './paginator.js';
