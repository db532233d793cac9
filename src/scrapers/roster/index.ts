export { ROSTER_CONFIG } from './constants';
export { extractRoster, RosterScraper, type ExtractRosterOptions } from './scraper';
