export interface FlagRule {
	caseSensitive: boolean,
}

export const normalizeFlag = (text: string, {caseSensitive}: FlagRule) => {
	const trimmed = text.trim();
	return caseSensitive ? trimmed : trimmed.toLowerCase();
};

/**
 * Trims both sides, lowercases both sides unless the rule is case-sensitive, then compares exactly.
 */
export const matchesFlag = (text: string, flag: string, rule: FlagRule) => (
	normalizeFlag(text, rule) === normalizeFlag(flag, rule)
);
