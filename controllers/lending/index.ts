import { NextFunction, Request, Response } from 'express';
import { lendingService } from '../../services';
import { formatUnits } from '../../utils/fixed-point';
import { amountField, booleanField, optionalStringField, requireUser, stringField } from '../../utils/request';
import {
  serializeLiquidation,
  serializeLiquidity,
  serializeMarket,
  serializePosition,
  serializeRepay,
  serializeUtilization,
} from './serializers';

export const listMarkets = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const markets = await lendingService.listMarkets();
    res.status(200).json({ data: markets.map(serializeMarket) });
  } catch (error) {
    next(error);
  }
};

export const getMarket = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const utilization = await lendingService.getAssetUtilization(req.params.asset);
    res.status(200).json({ data: serializeUtilization(utilization) });
  } catch (error) {
    next(error);
  }
};

export const supply = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const user = requireUser(req);
    const asset = req.params.asset;
    const supplied = await lendingService.supply(user.id, asset, amountField(req, 'amount'), {
      authorization: optionalStringField(req, 'authorization'),
    });
    res.status(200).json({ data: { asset, supplied: formatUnits(supplied) } });
  } catch (error) {
    next(error);
  }
};

export const withdraw = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const user = requireUser(req);
    const asset = req.params.asset;
    const supplied = await lendingService.withdraw(user.id, asset, amountField(req, 'amount'), {
      authorization: optionalStringField(req, 'authorization'),
    });
    res.status(200).json({ data: { asset, supplied: formatUnits(supplied) } });
  } catch (error) {
    next(error);
  }
};

export const borrow = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const user = requireUser(req);
    const asset = req.params.asset;
    const borrowed = await lendingService.borrow(user.id, asset, amountField(req, 'amount'), {
      authorization: optionalStringField(req, 'authorization'),
    });
    res.status(200).json({ data: { asset, borrowed: formatUnits(borrowed) } });
  } catch (error) {
    next(error);
  }
};

export const repay = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const user = requireUser(req);
    const asset = req.params.asset;
    const result = await lendingService.repay(user.id, asset, amountField(req, 'amount'), {
      authorization: optionalStringField(req, 'authorization'),
    });
    res.status(200).json({ data: { asset, ...serializeRepay(result) } });
  } catch (error) {
    next(error);
  }
};

export const setCollateral = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const user = requireUser(req);
    const asset = req.params.asset;
    const isCollateral = await lendingService.setCollateral(user.id, asset, booleanField(req, 'enabled'));
    res.status(200).json({ data: { asset, isCollateral } });
  } catch (error) {
    next(error);
  }
};

export const accrue = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const market = await lendingService.accrue(req.params.asset);
    res.status(200).json({ data: serializeMarket(market) });
  } catch (error) {
    next(error);
  }
};

export const liquidate = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const user = requireUser(req);
    const result = await lendingService.liquidate(
      {
        liquidator: user.id,
        borrower: stringField(req, 'borrower'),
        borrowAsset: stringField(req, 'borrowAsset'),
        collateralAsset: stringField(req, 'collateralAsset'),
        repayAmount: amountField(req, 'repayAmount'),
      },
      { authorization: optionalStringField(req, 'authorization') }
    );
    res.status(200).json({ data: serializeLiquidation(result) });
  } catch (error) {
    next(error);
  }
};

export const getAccountLiquidity = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const user = req.params.user;
    const liquidity = await lendingService.getAccountLiquidity(user);
    res.status(200).json({ data: serializeLiquidity(user, liquidity) });
  } catch (error) {
    next(error);
  }
};

export const getPositions = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const positions = await lendingService.getPositions(req.params.user);
    res.status(200).json({ data: positions.map(serializePosition) });
  } catch (error) {
    next(error);
  }
};

export const getBalances = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { user, asset } = req.params;
    const [supplied, borrowed] = await Promise.all([
      lendingService.getSupplyBalance(user, asset),
      lendingService.getBorrowBalance(user, asset),
    ]);
    res.status(200).json({ data: { user, asset, supplied: formatUnits(supplied), borrowed: formatUnits(borrowed) } });
  } catch (error) {
    next(error);
  }
};
