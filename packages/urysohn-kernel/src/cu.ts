/**
 * CU node: a closed set inside an open set.
 *
 * Nodes form an infinite binary tree that is generated lazily:
 *
 *   node         = (C, U)
 *   node.left()  = (C, V)              V = oracle.separate(C, U)
 *   node.right() = (closure(V), U)
 *
 * so node.left().U ⊆ node.right().C at every node. Nodes are immutable;
 * the oracle result and both children are memoized per node.
 */

import type { Space, NormalityOracle } from './space.js';
import { UrysohnError, PreconditionViolatedError, OracleContractViolatedError } from './errors.js';

export interface CUOptions {
  /**
   * Verify `C ⊆ U` at construction and the oracle contract on every
   * separation, where the space can decide `subset`. Default true.
   */
  checkContracts?: boolean;
}

export interface CUReadback {
  path: string;
  depth: number;
  space: string;
  C?: string;
  U?: string;
}

/** State shared by every node of one tree. Never mutated after make(). */
interface TreeContext<P, O, K> {
  space: Space<P, O, K>;
  oracle: NormalityOracle<O, K>;
  checkContracts: boolean;
}

export class CU<P, O, K> {
  private separatorCell: O | undefined;
  private leftCell: CU<P, O, K> | undefined;
  private rightCell: CU<P, O, K> | undefined;

  private constructor(
    readonly C: K,
    readonly U: O,
    private readonly ctx: TreeContext<P, O, K>,
    /** L/R steps from the root. */
    readonly path: string,
  ) {}

  /** Root constructor. Throws PreconditionViolatedError when `C ⊄ U` is detectable. */
  static make<P, O, K>(
    space: Space<P, O, K>,
    oracle: NormalityOracle<O, K>,
    C: K,
    U: O,
    options: CUOptions = {},
  ): CU<P, O, K> {
    const checkContracts = options.checkContracts ?? true;
    if (checkContracts && space.isClosed && !space.isClosed(C)) {
      throw new PreconditionViolatedError(`CU requires a closed C, got ${space.describeClosed?.(C) ?? '<set>'}`);
    }
    if (checkContracts && space.isOpen && !space.isOpen(U)) {
      throw new PreconditionViolatedError(`CU requires an open U, got ${space.describeOpen?.(U) ?? '<set>'}`);
    }
    if (checkContracts && space.subset && !space.subset(C, U)) {
      throw new PreconditionViolatedError(
        `CU requires C ⊆ U, got C = ${space.describeClosed?.(C) ?? '<set>'}, U = ${space.describeOpen?.(U) ?? '<set>'}`,
      );
    }
    return new CU(C, U, { space, oracle, checkContracts }, '');
  }

  get space(): Space<P, O, K> { return this.ctx.space; }
  get depth(): number { return this.path.length; }
  get checksContracts(): boolean { return this.ctx.checkContracts; }

  inC(p: P): boolean { return this.ctx.space.inClosed(this.C, p); }
  inU(p: P): boolean { return this.ctx.space.inOpen(this.U, p); }

  /** The oracle's open set between C and U. Computed at most once. */
  separator(): O {
    if (this.separatorCell === undefined) {
      const { space, oracle, checkContracts } = this.ctx;
      const v = oracle.separate(this.C, this.U);
      if (checkContracts && space.subset) {
        if (!space.subset(this.C, v)) {
          throw this.contractError(`C ⊄ separate(C, U) = ${space.describeOpen?.(v) ?? '<set>'}`);
        }
        const closureV = space.closure(v);
        if (!space.subset(closureV, this.U)) {
          throw this.contractError(
            `closure(separate(C, U)) = ${space.describeClosed?.(closureV) ?? '<set>'} ⊄ U`,
          );
        }
      }
      this.separatorCell = v;
    }
    return this.separatorCell;
  }

  left(): CU<P, O, K> {
    if (!this.leftCell) {
      this.leftCell = new CU(this.C, this.separator(), this.ctx, this.path + 'L');
    }
    return this.leftCell;
  }

  right(): CU<P, O, K> {
    if (!this.rightCell) {
      this.rightCell = new CU(this.ctx.space.closure(this.separator()), this.U, this.ctx, this.path + 'R');
    }
    return this.rightCell;
  }

  /** Node reached by following an L/R path from this node. */
  descend(path: string): CU<P, O, K> {
    let node: CU<P, O, K> = this;
    for (const step of path) {
      if (step === 'L') node = node.left();
      else if (step === 'R') node = node.right();
      else throw new UrysohnError(`Invalid path step "${step}". Use only "L" and "R".`, 'INVALID_ARGUMENT');
    }
    return node;
  }

  readback(): CUReadback {
    const { space } = this.ctx;
    const out: CUReadback = { path: this.path, depth: this.depth, space: space.name };
    if (space.describeClosed) out.C = space.describeClosed(this.C);
    if (space.describeOpen) out.U = space.describeOpen(this.U);
    return out;
  }

  /**
   * Error for a node whose C/U relation is broken at some point. At the root
   * that is the caller's precondition, below it the oracle's contract.
   */
  invariantError(detail: string): PreconditionViolatedError | OracleContractViolatedError {
    if (this.path === '') return new PreconditionViolatedError(`CU requires C ⊆ U: ${detail}`);
    return this.contractError(detail);
  }

  /** Error for this node's oracle result. */
  contractError(detail: string): OracleContractViolatedError {
    return new OracleContractViolatedError(
      `Oracle contract violated at node "${this.path || 'root'}": ${detail}`,
      this.path,
    );
  }
}
