/**
 * A three-organisation survey laid out like the consultation export:
 * respondent columns, then question columns with reasoning columns and
 * section marker columns between them.
 */
export const SURVEY_HEADER = [
  "Response ID",
  "4. What is your organisation name?",
  "6. Which category best describes your organisation? (Select all that apply) - Selected Choice",
  "7. Which Nation or Region are you / your organisation located in, or interested in?",
  "1. Do you agree with the proposed approach? - Selected Choice",
  "Please provide your reasoning",
  "Strategic Investment Need",
  "2. Which projects should be prioritised?",
  "If you answered no, please explain",
  "Overall",
  "3. Do you agree with the overall plan? - Selected Choice",
  "Please provide your reasoning",
];

export const SURVEY_ROWS = [
  [
    "R_001",
    "Northern Power",
    "Developer",
    "Scotland",
    "Strongly agree",
    "Faster connections are welcome",
    "",
    "Storage and interconnectors",
    "",
    "",
    "Somewhat disagree",
    "",
  ],
  ["R_002", "acme Storage", "Trade body", "Wales", "No"],
  ["R_003", "Beta Grid", "Network", "England", "Neutral", "", "", "", "", "", "", "We need more detail on the plan"],
];
