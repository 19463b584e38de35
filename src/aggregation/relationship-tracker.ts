import { InvariantViolationError } from '../utils/errors.js';
import type { AggregationContext } from './context.js';

/**
 * Keeps each category's faculty/department counts equal to the size of the
 * sets they summarize. Counts are recomputed wholesale, never incremented,
 * so a later merge cannot leave them stale.
 */
export class RelationshipTracker {
    constructor(private readonly context: AggregationContext) {}

    updateFacultyCount(): void {
        for (const category of this.context.categoryData.values()) {
            category.facultyCount = category.faculty.size;
        }
    }

    updateDepartmentCount(): void {
        for (const category of this.context.categoryData.values()) {
            category.departmentCount = category.departments.size;
        }
    }

    recompute(): void {
        this.updateFacultyCount();
        this.updateDepartmentCount();
    }

    /**
     * Throw on the first category whose derived counts disagree with its sets.
     */
    verify(): void {
        for (const category of this.context.categoryData.values()) {
            if (category.facultyCount !== category.faculty.size) {
                throw new InvariantViolationError(category.key, 'facultyCount', category.faculty.size, category.facultyCount);
            }
            if (category.departmentCount !== category.departments.size) {
                throw new InvariantViolationError(category.key, 'departmentCount', category.departments.size, category.departmentCount);
            }
        }
    }
}
