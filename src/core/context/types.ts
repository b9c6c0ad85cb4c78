/**
 * Context and profile types
 */

export type ProfileCallback = () => void;

/**
 * Read-only view of a registered profile
 */
export interface ProfileDescriptor {
	readonly name: string;
	readonly onActivate: ProfileCallback;
	readonly onDeactivate: ProfileCallback;
}

export interface ProfileRecord {
	readonly name: string;
	onActivate: ProfileCallback;
	onDeactivate: ProfileCallback;
}

export interface ContextRecord {
	readonly name: string;
	readonly profiles: Map<string, ProfileRecord>;
	active: string | null;
}
