import { z } from 'zod';

/**
 * Execution feedback posted by a device for one deployment
 */
export const statusReportSchema = z.object({
	id: z.string(),
	time: z.string(),
	status: z.string(),
	details: z.array(z.string()).default([]),
});

export type StatusReportBody = z.infer<typeof statusReportSchema>;

/**
 * Validation failure in the `{ detail: [...] }` shape clients of the DDI mock expect
 */
export interface ValidationErrorBody {
	detail: Array<{ loc: Array<string | number>; msg: string; type: string }>;
}

export function toValidationErrorBody(error: z.ZodError): ValidationErrorBody {
	return {
		detail: error.issues.map((issue) => ({
			loc: ['body', ...issue.path],
			msg: issue.message,
			type: issue.code,
		})),
	};
}
