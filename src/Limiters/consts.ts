/** Common `periodMs` values */
export const Period = {
	Second: 1000,
	Minute: 60 * 1000,
} as const;
