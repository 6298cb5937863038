import {
  AccountRepository,
  CategoryRepository,
  SQLiteDriver,
  TransactionRepository,
  openConnection,
} from '@tally/db'
import { createQueryOps, withDriver } from '../query-ops'
import { createQueryTools } from '../tools/query-tools'
import { Tool, ToolResult } from '../tools/tool'

const day = (key: string) => new Date(`${key}T00:00:00.000Z`)

function parse(result: ToolResult): unknown {
  expect(result.isError).toBeUndefined()
  return JSON.parse(result.content[0].text)
}

describe('query tools', () => {
  let driver: SQLiteDriver
  let tools: Map<string, Tool>
  let checkingId: number

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined)
    driver = await openConnection({ filename: ':memory:' })

    const accounts = new AccountRepository(driver)
    const categories = new CategoryRepository(driver)
    const transactions = new TransactionRepository(driver)
    checkingId = accounts.create({ name: 'Checking', accountType: 'BANK' }).accountId
    const food = categories.create({ name: 'Food', categoryType: 'EXPENSE' })
    const salary = categories.create({ name: 'Salary', categoryType: 'INCOME' })
    transactions.create({ accountId: checkingId, categoryId: food.categoryId, amount: -12.5, transactionDate: day('2024-01-01'), description: 'Bakery' })
    transactions.create({ accountId: checkingId, categoryId: food.categoryId, amount: -30, transactionDate: day('2024-01-20'), description: 'Market' })
    transactions.create({ accountId: checkingId, categoryId: salary.categoryId, amount: 2000, transactionDate: day('2024-01-31'), description: null })

    const ops = await createQueryOps(withDriver(driver))
    tools = new Map(createQueryTools(ops).map(t => [t.name, t]))
  })

  afterEach(() => {
    driver.close()
    jest.restoreAllMocks()
  })

  function call(name: string, params: unknown): ToolResult {
    const tool = tools.get(name)
    if (!tool) throw new Error(`no tool named ${name}`)
    return tool.call(params)
  }

  it('should register one tool per read operation', () => {
    expect([...tools.keys()]).toEqual([
      'get_account',
      'search_accounts',
      'list_accounts',
      'list_categories',
      'search_categories',
      'get_transaction',
      'list_account_transactions',
      'transactions_by_date',
      'search_transactions',
      'account_balance',
      'latest_transactions',
      'category_summary',
    ])
  })

  it('should look an account up by id or by name', () => {
    expect(parse(call('get_account', { accountId: checkingId }))).toMatchObject({ name: 'Checking' })
    expect(parse(call('get_account', { name: 'Checking' }))).toMatchObject({ accountId: checkingId })
  })

  it('should require an account id or name', () => {
    expect(call('get_account', {})).toEqual({
      content: [{ type: 'text', text: 'accountId or name is required' }],
      isError: true,
    })
  })

  it('should turn NotFound into an error result', () => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined)

    expect(call('get_account', { name: 'Brokerage' })).toEqual({
      content: [{ type: 'text', text: 'account not found: Brokerage' }],
      isError: true,
    })
  })

  it('should filter categories by type', () => {
    const categories = parse(call('list_categories', { categoryType: 'INCOME' }))

    expect(categories).toMatchObject([{ name: 'Salary' }])
    expect(parse(call('list_categories', {}))).toHaveLength(2)
  })

  it('should report balance and count together', () => {
    expect(parse(call('account_balance', { accountId: checkingId }))).toEqual({
      accountId: checkingId,
      balance: 1957.5,
      transactionCount: 3,
    })
  })

  it('should list transactions in a range with calendar dates, newest first', () => {
    const listed = parse(call('list_account_transactions', { accountId: checkingId, start: '2024-01-01', end: '2024-01-20' }))

    expect(listed).toMatchObject([
      { description: 'Market', transactionDate: '2024-01-20', category: { name: 'Food' } },
      { description: 'Bakery', transactionDate: '2024-01-01', category: { name: 'Food' } },
    ])
  })

  it('should reject a malformed date', () => {
    const result = call('transactions_by_date', { start: '01/02/2024', end: '2024-01-31' })

    expect(result).toEqual({
      content: [{ type: 'text', text: "missing or invalid 'start' parameter" }],
      isError: true,
    })
  })

  it('should reject a date that does not exist', () => {
    const result = call('transactions_by_date', { start: '2024-02-01', end: '2024-02-30' })

    expect(result).toEqual({
      content: [{ type: 'text', text: "missing or invalid 'end' parameter" }],
      isError: true,
    })
  })

  it('should search descriptions', () => {
    expect(parse(call('search_transactions', { keyword: 'bak' }))).toMatchObject([{ amount: -12.5 }])
    expect(parse(call('search_transactions', { keyword: 'rent' }))).toEqual([])
  })

  it('should default the latest-transactions limit', () => {
    expect(parse(call('latest_transactions', { accountId: checkingId }))).toHaveLength(3)
    expect(parse(call('latest_transactions', { accountId: checkingId, limit: 1 }))).toMatchObject([
      { transactionDate: '2024-01-31' },
    ])
  })

  it('should summarize by category', () => {
    expect(parse(call('category_summary', { accountId: checkingId }))).toEqual([
      { categoryName: 'Food', totalAmount: -42.5, count: 2 },
      { categoryName: 'Salary', totalAmount: 2000, count: 1 },
    ])
  })
})
