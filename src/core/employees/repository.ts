import fs from 'node:fs/promises'
import { z } from 'zod'
import { logger } from '../../utils/logger.js'

const employeeSchema = z.object({
  personId: z.string().min(1),
  employeeId: z.string().min(1),
  name: z.string().optional(),
})

const employeesFileSchema = z.object({
  employees: z.array(employeeSchema),
})

export type EmployeeRecord = z.infer<typeof employeeSchema>
export type EmployeesFile = z.infer<typeof employeesFileSchema>

/**
 * Chat user id -> HR employee id mapping, read from a JSON file shaped like
 * `{ "employees": [{ "personId": "...", "employeeId": "HR-EMP-0001" }] }`.
 */
export class EmployeeDirectory {
  readonly directoryPath: string
  private byPersonId = new Map<string, EmployeeRecord>()

  constructor(directoryPath: string) {
    this.directoryPath = directoryPath
  }

  async load(): Promise<EmployeesFile> {
    let raw: string
    try {
      raw = await fs.readFile(this.directoryPath, 'utf8')
    }
    catch (error) {
      logger.warn('Employee directory not found; every identity lookup will fail', { path: this.directoryPath, error })
      this.byPersonId = new Map()
      return { employees: [] }
    }

    try {
      const file = employeesFileSchema.parse(JSON.parse(raw))
      this.replace(file.employees)
      logger.debug('Employee directory loaded', {
        path: this.directoryPath,
        count: file.employees.length,
      })
      return file
    }
    catch (error) {
      logger.error('Failed to load employee directory', { path: this.directoryPath, error })
      throw error
    }
  }

  replace(employees: EmployeeRecord[]): void {
    const next = new Map<string, EmployeeRecord>()
    for (const employee of employees) {
      if (next.has(employee.personId)) {
        logger.warn('Duplicate employee directory entry; keeping the last one', { personId: employee.personId })
      }
      next.set(employee.personId, employee)
    }
    this.byPersonId = next
  }

  find(personId: string): EmployeeRecord | undefined {
    return this.byPersonId.get(personId)
  }

  get size(): number {
    return this.byPersonId.size
  }
}
