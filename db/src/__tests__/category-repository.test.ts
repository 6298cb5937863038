import { TestStore, openTestStore } from './helpers'

describe('CategoryRepository', () => {
  let store: TestStore

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined)
    store = await openTestStore()
    store.categories.create({ name: 'Groceries', categoryType: 'EXPENSE' })
    store.categories.create({ name: 'Dining Out', categoryType: 'EXPENSE' })
    store.categories.create({ name: 'Salary', categoryType: 'INCOME' })
  })

  afterEach(() => {
    store.driver.close()
    jest.restoreAllMocks()
  })

  describe('findByType', () => {
    it('should return categories of the exact type', () => {
      const expenses = store.categories.findByType('EXPENSE')

      expect(expenses.map(c => c.name)).toEqual(['Dining Out', 'Groceries'])
      expect(expenses.every(c => c.categoryType === 'EXPENSE')).toBe(true)
    })

    it('should be case-sensitive on the type', () => {
      expect(store.categories.findByType('expense')).toEqual([])
    })

    it('should return an empty array for an unknown type', () => {
      expect(store.categories.findByType('TRANSFER')).toEqual([])
    })
  })

  describe('findByNameLike', () => {
    it('should match a substring regardless of case', () => {
      expect(store.categories.findByNameLike('sal').map(c => c.name)).toEqual(['Salary'])
    })

    it('should fold case outside ASCII', () => {
      store.categories.create({ name: 'Übersetzung', categoryType: 'EXPENSE' })

      expect(store.categories.findByNameLike('über').map(c => c.name)).toEqual(['Übersetzung'])
      expect(store.categories.findByNameLike('ÜBER').map(c => c.name)).toEqual(['Übersetzung'])
    })

    it('should return every category for an empty keyword', () => {
      expect(store.categories.findByNameLike('')).toHaveLength(3)
    })

    it('should return an empty array when nothing matches', () => {
      expect(store.categories.findByNameLike('rent')).toEqual([])
    })
  })

  it('should reject a duplicate name', () => {
    expect(() => store.categories.create({ name: 'Salary', categoryType: 'INCOME' }))
      .toThrow(/UNIQUE constraint failed: categories.name/)
  })
})
