// SPDX-License-Identifier: Apache-2.0

import {Exclude, Expose} from 'class-transformer';

@Exclude()
export class StackFile {
  @Expose()
  public config: Record<string, unknown>;

  public constructor(config?: Record<string, unknown>) {
    this.config = config ?? {};
  }
}
