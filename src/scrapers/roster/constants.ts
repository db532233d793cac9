// Configuration constants for the roster page (MPs elected at the 2024 UK general election)
export const ROSTER_CONFIG = {
  URLS: {
    ROSTER:
      'https://en.wikipedia.org/wiki/List_of_MPs_elected_in_the_2024_United_Kingdom_general_election',
    BASE_URL: 'https://en.wikipedia.org',
  },
  TABLE_ID: 'elected-mps',
  // Rows with this many cells or fewer are headers or spacers
  MIN_CELLS_EXCLUSIVE: 5,
  CELLS: {
    NAME: 3,
    PARTY: 5,
  },
} as const;
