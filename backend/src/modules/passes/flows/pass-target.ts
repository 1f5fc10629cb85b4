import type { PassTarget } from '../../access';
import type { Pass } from '../pass.types';

export function passTarget(pass: Pass): PassTarget {
  return { kind: 'pass', schoolId: pass.schoolId, studentId: pass.studentId };
}
