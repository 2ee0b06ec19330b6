export {
	type InterestAccrualOptions,
	interestAccrual,
	monthKey,
} from "./interest-accrual.js";
