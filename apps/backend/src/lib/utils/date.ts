import { format } from "date-fns";

export function formatPostDate(date: Date = new Date()): string {
	return format(date, "MMMM dd, yyyy"); // "October 05, 2026"
}
