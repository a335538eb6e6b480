/**
 * Job Record - A scraped job listing
 *
 * Produced by the job-board scraper. Position in the sequence is the
 * row identity used to re-align scores, so records are never mutated;
 * every stage returns annotated copies.
 */

export type JobField = string | number | boolean | null;

export interface JobRecord {
  // Nullable: scrapers emit null for values they could not read
  companyName: string | null;
  title: string;
  location: string | null;
  description: string | null;

  jobUrl?: string;
  datePosted?: string;
  site?: string;

  // Any other scraper columns, carried through untouched
  extra: Record<string, JobField>;
}
