export const NAMING_PROMPT = [
  'Look at this image and reply with a filename ONLY. No explanation, no reasoning, no extra text.',
  '',
  'FORMAT:',
  'Documents: YYYY-MM-DD - Sender - Three Word Summary',
  'Photos: Year - Subject - Location',
  '',
  'EXAMPLES:',
  'Water bill from City Utilities dated Mar 4, 2025 -> 2025-03-04 - City Utilities - Water Bill',
  'Lease renewal from a landlord dated Aug 30, 2023 -> 2023-08-30 - Oak Street Rentals - Lease Renewal',
  'Dental intake form with no date -> 0000-00-00 - Dental Office - Patient Intake Form',
  'Birthday party photo from 2012 -> 2012 - Birthday Party - Backyard',
  'Old photo with unknown year -> 0000 - Person Name - Location Description',
  '',
  'Reply with the filename only:',
].join('\n');
