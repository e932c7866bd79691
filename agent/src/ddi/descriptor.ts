import type { DeploymentDescriptor } from './types';

export interface DescriptorFields {
	id?: string;
	downloadUrl?: string;
	size?: number;
}

export function createDescriptor(fields: DescriptorFields = {}): DeploymentDescriptor {
	const id = fields.id ?? '';
	const downloadUrl = fields.downloadUrl ?? '';
	const size = fields.size !== undefined && Number.isSafeInteger(fields.size) && fields.size >= 0
		? fields.size
		: 0;

	return Object.freeze({
		id,
		downloadUrl,
		size,
		hasDeployment: id !== '' && downloadUrl !== '',
	});
}

export const NO_DEPLOYMENT: DeploymentDescriptor = createDescriptor();
