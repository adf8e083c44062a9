import { compareNatural, naturalSortKey } from '../../src/domain/common/naturalSort';

describe('naturalSort', () => {
  it('should split titles into text and number runs', () => {
    expect(naturalSortKey('Module  2 Intro')).toEqual(['module ', 2, ' intro']);
  });

  it('should order numbers by value', () => {
    expect(['Task 10', 'Task 2', 'Task 1'].sort(compareNatural)).toEqual(['Task 1', 'Task 2', 'Task 10']);
  });

  it('should ignore case and put a prefix first', () => {
    expect(['task 3', 'Task', 'TASK 2'].sort(compareNatural)).toEqual(['Task', 'TASK 2', 'task 3']);
  });
});
