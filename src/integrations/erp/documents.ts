import crypto from 'node:crypto'
import type { EmployeeIdentity } from '../../core/rollcall/types.js'

export const SAVEDOCS_PATH = '/api/method/frappe.desk.form.save.savedocs'

export type CheckinLogType = 'IN' | 'OUT'

export interface EmployeeCheckinDoc {
  docstatus: 0
  doctype: 'Employee Checkin'
  name: string
  __islocal: true
  __unsaved: true
  owner: string
  log_type: CheckinLogType
  time: string
  skip_auto_attendance: 0
  offshift: 0
  employee: string
  employee_name: string
}

export interface AttendanceDoc {
  docstatus: 0
  doctype: 'Attendance'
  name: string
  __islocal: true
  __unsaved: true
  owner: string
  status: 'Absent'
  attendance_date: string
  employee: string
  employee_name: string
  remarks: string
}

const NAME_ALPHABET = 'abcdefghijklmnopqrstuvwxyz'

/**
 * Local draft name in the form `new-<prefix>-<10 letters>`. Not globally
 * unique; the server assigns the final name.
 */
export function generateDocName(prefix: string): string {
  let suffix = ''
  for (let i = 0; i < 10; i += 1) {
    suffix += NAME_ALPHABET[crypto.randomInt(NAME_ALPHABET.length)]
  }
  return `new-${prefix}-${suffix}`
}

export function buildCheckinDoc(
  identity: EmployeeIdentity,
  logType: CheckinLogType,
  time: string,
  owner: string,
): EmployeeCheckinDoc {
  return {
    docstatus: 0,
    doctype: 'Employee Checkin',
    name: generateDocName(logType === 'IN' ? 'employee-checkin' : 'employee-checkout'),
    __islocal: true,
    __unsaved: true,
    owner,
    log_type: logType,
    time,
    skip_auto_attendance: 0,
    offshift: 0,
    employee: identity.employeeId,
    employee_name: identity.displayName,
  }
}

export function buildAbsenceDoc(
  identity: EmployeeIdentity,
  date: string,
  owner: string,
  reason: string,
): AttendanceDoc {
  return {
    docstatus: 0,
    doctype: 'Attendance',
    name: generateDocName('attendance'),
    __islocal: true,
    __unsaved: true,
    owner,
    status: 'Absent',
    attendance_date: date,
    employee: identity.employeeId,
    employee_name: identity.displayName,
    remarks: reason,
  }
}
