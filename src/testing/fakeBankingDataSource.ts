import type { Account, BankingDataSource, Customer, EntityCounts, Transaction } from "../database/banking";

export function customer(id: number): Customer {
    return {
        id,
        customerId: `C0000${id}`,
        firstName: `First${id}`,
        lastName: `Last${id}`,
        email: `customer${id}@example.com`,
        phone: null,
        dateOfBirth: null,
        addressCity: "Denver",
        addressState: "CO",
        addressZip: "80202",
        creditScore: 700,
        customerSince: "2021-03-04",
        segment: "RETAIL",
        riskRating: "LOW",
    };
}

export function account(id: number, customerId: string): Account {
    return {
        id,
        accountNumber: `ACC${id}`,
        accountType: "SAVINGS",
        balance: "100.00",
        interestRate: "0.0200",
        creditLimit: null,
        status: "ACTIVE",
        openedDate: "2021-03-04",
        customerId,
        customerName: "First1 Last1",
    };
}

/** Banking entities held in arrays, paged like the Postgres source. */
export class FakeBankingDataSource implements BankingDataSource {
    readonly customerRows = [customer(1), customer(2), customer(3)];
    readonly accountRows = [account(11, "C00001"), account(12, "C00002")];
    readonly transactionRows: Transaction[] = [
        { id: 1, accountId: 11, transactionType: "DEPOSIT", amount: "50.00", merchantCategory: null, channel: "BRANCH" },
    ];

    async customers(page: number, pageSize: number): Promise<Customer[]> {
        return this.customerRows.slice(page * pageSize, (page + 1) * pageSize);
    }

    async accounts(page: number, pageSize: number): Promise<Account[]> {
        return this.accountRows.slice(page * pageSize, (page + 1) * pageSize);
    }

    async transactionsForAccount(accountId: number): Promise<Transaction[]> {
        return this.transactionRows.filter((row) => row.accountId === accountId);
    }

    async counts(): Promise<EntityCounts> {
        return {
            customers: this.customerRows.length,
            accounts: this.accountRows.length,
            transactions: this.transactionRows.length,
        };
    }
}
