import { describe, it, expect } from 'vitest';
import {
  presentSchoolDashboard,
  presentTeacherDashboard,
  toMetric,
} from '../../../src/modules/analytics/presentation/dashboard.presenter';
import type { SchoolAggregate } from '../../../src/modules/analytics/analytics.types';
import { T0 } from '../../helpers/manual-clock';

const school: SchoolAggregate = {
  grantedCount: 6,
  completedCount: 2,
  avgAbsenceMinutes: 11.5,
  requestCount: 7,
  teacherCount: 2,
  avgGrantedPerTeacher: 3,
  peakRequestHours: [{ hour: 9, count: 4 }],
};

describe('toMetric', () => {
  it('shows the value once the sample is large enough', () => {
    expect(toMetric(4.2, 3, 3)).toEqual({ status: 'OK', value: 4.2, sampleSize: 3 });
  });

  it('withholds small samples and missing values', () => {
    expect(toMetric(4.2, 2, 3)).toEqual({ status: 'INSUFFICIENT_DATA', sampleSize: 2, required: 3 });
    expect(toMetric(null, 0, 1)).toEqual({ status: 'INSUFFICIENT_DATA', sampleSize: 0, required: 1 });
  });
});

describe('presentTeacherDashboard', () => {
  it('keeps counts plain and gates the teacher average', () => {
    const dashboard = presentTeacherDashboard({
      window: '7d',
      generatedAt: T0,
      teacher: { grantedCount: 2, completedCount: 0, avgAbsenceMinutes: null },
      school,
      options: { minSample: 2 },
    });

    expect(dashboard).toEqual({
      scope: 'teacher',
      window: '7d',
      generatedAt: T0,
      teacher: {
        grantedCount: 2,
        completedCount: 0,
        avgAbsenceMinutes: { status: 'INSUFFICIENT_DATA', sampleSize: 0, required: 2 },
      },
      schoolComparison: {
        avgGrantedPerTeacher: { status: 'OK', value: 3, sampleSize: 2 },
        avgAbsenceMinutes: { status: 'OK', value: 11.5, sampleSize: 2 },
      },
    });
  });
});

describe('presentSchoolDashboard', () => {
  it('includes occupancy and peak hours', () => {
    const dashboard = presentSchoolDashboard({
      window: '30d',
      generatedAt: T0,
      school,
      occupancy: { activeNow: 1, limit: 5 },
      options: { minSample: 3 },
    });

    expect(dashboard.occupancy).toEqual({ activeNow: 1, limit: 5 });
    expect(dashboard.school.requestCount).toBe(7);
    expect(dashboard.school.avgAbsenceMinutes).toEqual({
      status: 'INSUFFICIENT_DATA',
      sampleSize: 2,
      required: 3,
    });
    expect(dashboard.school.peakRequestHours).toEqual({
      status: 'OK',
      value: [{ hour: 9, count: 4 }],
      sampleSize: 7,
    });
  });
});
