import type { TableDefinition } from '../model';
import type { TemporalStrategy } from './base';
import { CopyOnChangeStrategy } from './copyOnChange';
import { NoneStrategy } from './none';
import { Scd2Strategy } from './scd2';

export type { ReadOptions, WriteContext } from './base';
export { TemporalStrategy } from './base';
export { NoneStrategy } from './none';
export { CopyOnChangeStrategy, WHOLE_RECORD } from './copyOnChange';
export { Scd2Strategy } from './scd2';

export function createStrategy(table: TableDefinition): TemporalStrategy {
  switch (table.strategy) {
    case 'none':
      return new NoneStrategy(table);
    case 'copy_on_change':
      return new CopyOnChangeStrategy(table);
    case 'scd2':
      return new Scd2Strategy(table);
  }
}
