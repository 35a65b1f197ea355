import type { CategoryResult } from '../../shared/types';

export interface CategorizeInput {
  url: string;
  title?: string | null;
  content?: string | null;
}

export interface Categorizer {
  categorize: (input: CategorizeInput) => Promise<CategoryResult>;
}
