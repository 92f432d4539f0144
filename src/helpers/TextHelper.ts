const ENTITIES: Record<string, string> = {
	"&nbsp;": " ",
	"&amp;": "&",
	"&lt;": "<",
	"&gt;": ">",
	"&quot;": "\"",
	"&#39;": "'",
};

/** Plain, single-spaced text of a rich-text answer. */
export function stripMarkup(html: string): string {
	return html
		.replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, " ")
		.replace(/<[^>]*>/g, " ")
		.replace(/&(nbsp|amp|lt|gt|quot|#39);/g, entity => ENTITIES[entity] ?? entity)
		.replace(/\s+/g, " ")
		.trim();
}

/** Strict decimal parse: blank or partially numeric strings are not numbers. */
export function parseNumber(value: string): number | null {
	const trimmed = value.trim();
	if (trimmed === "") {
		return null;
	}
	const parsed = Number(trimmed);
	return Number.isFinite(parsed) ? parsed : null;
}
