export {
	assertAccountBalance,
	assertLedgerMatchesBalance,
	assertTotalBalance,
	assertTransferPair,
} from "./assertions.js";
export {
	createSteppingClock,
	getTestInstance,
	TEST_ACCOUNT_TYPES,
	TEST_EPOCH,
	TEST_LOAN_PRODUCTS,
	type TestInstance,
	type TestInstanceOptions,
} from "./get-test-instance.js";
