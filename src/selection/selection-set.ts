/**
 * Selection Set
 *
 * Positional set of row indexes. Positions refer to the current dataset
 * window, not to item identity, so a selected position stays selected when a
 * different page lands in the window unless the owner clears it.
 *
 * Every mutator returns the positions whose membership actually changed, so
 * the caller can notify exactly those rows.
 */

export class SelectionSet {
  private readonly selected = new Set<number>();

  public has(index: number): boolean {
    return this.selected.has(index);
  }

  public get size(): number {
    return this.selected.size;
  }

  public select(index: number): number[] {
    if (this.selected.has(index)) {
      return [];
    }
    this.selected.add(index);
    return [index];
  }

  public unselect(index: number): number[] {
    return this.selected.delete(index) ? [index] : [];
  }

  public toggle(index: number): number[] {
    if (!this.selected.delete(index)) {
      this.selected.add(index);
    }
    return [index];
  }

  /**
   * Select positions `0..count-1`
   */
  public selectRange(count: number): number[] {
    const changed: number[] = [];
    for (let index = 0; index < count; index++) {
      if (!this.selected.has(index)) {
        this.selected.add(index);
        changed.push(index);
      }
    }
    return changed;
  }

  public clear(): number[] {
    const changed = this.toArray();
    this.selected.clear();
    return changed;
  }

  /**
   * Ascending snapshot of selected positions
   */
  public toArray(): number[] {
    return [...this.selected].sort((a, b) => a - b);
  }
}
