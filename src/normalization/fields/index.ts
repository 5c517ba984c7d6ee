export { normalizeSalary } from "./salary";
export { normalizeVacancyCount } from "./vacancyCount";
export { normalizeDate } from "./date";
export { normalizeContractCode, describeContract } from "./contractCode";
export { normalizeFreeText, normalizeListText, cleanFreeText } from "./freeText";
export { normalizeJobTitle } from "./jobTitle";
export { normalizePostingId } from "./postingId";
