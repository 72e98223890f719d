import { filterXSS } from "xss";

// Post bodies and comments come from a rich-text editor and are rendered raw.
export function sanitizeRichText(html: string): string {
	return filterXSS(html);
}
