import { IPC_CHANNELS } from '../../shared/constants/channels'
import { actorOf, handle } from './registry'
import { readInteger, readObject, readOptionalInteger, readString } from './payload'
import * as facultyRepo from '../sheets/repositories/faculty.repo'
import { addFaculty, deleteFaculty, listFacultyOptions, updateFaculty } from '../services/faculty.service'

export function registerFacultyHandlers(): void {
  handle(IPC_CHANNELS.FACULTY_LIST, 'admin', () => facultyRepo.listFaculty())

  handle(IPC_CHANNELS.FACULTY_OPTIONS, 'admin', () => listFacultyOptions())

  handle(IPC_CHANNELS.FACULTY_ADD, 'admin', (payload, context) => {
    const input = readObject(payload)
    return addFaculty(
      {
        no: readOptionalInteger(input, 'no'),
        department: readString(input, 'department'),
        rank: readString(input, 'rank'),
        name: readString(input, 'name')
      },
      actorOf(context)
    )
  })

  handle(IPC_CHANNELS.FACULTY_UPDATE, 'admin', (payload, context) => {
    const input = readObject(payload)
    return updateFaculty(
      readInteger(input, 'no'),
      {
        department: readString(input, 'department'),
        rank: readString(input, 'rank'),
        name: readString(input, 'name')
      },
      actorOf(context)
    )
  })

  handle(IPC_CHANNELS.FACULTY_DELETE, 'admin', (payload, context) => {
    return deleteFaculty(readInteger(readObject(payload), 'no'), actorOf(context))
  })
}
