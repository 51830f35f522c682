/**
 * Date Utilities
 */

function pad(value: number, width = 2): string {
	return String(value).padStart(width, "0");
}

/**
 * Format a date as YYYYMMDD_HHMMSS in local time
 * Used for export file names
 */
export function formatTimestamp(date: Date): string {
	const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
	const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
	return `${day}_${time}`;
}
