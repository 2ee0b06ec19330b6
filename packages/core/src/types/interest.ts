export interface InterestPosting {
	accountId: string;
	/** Balance the interest was computed on */
	balanceBefore: number;
	interest: number;
	transactionId: string;
}

export interface InterestBatchResult {
	batchId: string;
	postedCount: number;
	totalInterest: number;
	postings: InterestPosting[];
}
