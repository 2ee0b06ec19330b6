export type AccountStatus = "ACTIVE" | "FROZEN" | "CLOSED";

export interface Account {
	id: string;
	/** Human-facing number from the identity service, e.g. "AC04417293" */
	accountNumber: string;
	customerId: string;
	branchId: string;
	accountTypeId: string;
	/** Current balance in minor units (cents/paise). Never negative. */
	balance: number;
	status: AccountStatus;
	openedAt: Date;
	closedAt: Date | null;
}
