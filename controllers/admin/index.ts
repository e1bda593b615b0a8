import { NextFunction, Request, Response } from 'express';
import { adminService } from '../../services';
import { formatUnits } from '../../utils/fixed-point';
import { amountField, booleanField, stringField } from '../../utils/request';
import { serializeMarket } from '../lending/serializers';

export const registerMarket = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const market = await adminService.registerMarket({
      asset: stringField(req, 'asset'),
      annualSupplyRate: amountField(req, 'annualSupplyRate'),
      annualBorrowRate: amountField(req, 'annualBorrowRate'),
      reserveFactor: amountField(req, 'reserveFactor'),
      collateralFactor: amountField(req, 'collateralFactor'),
      liquidationThreshold: amountField(req, 'liquidationThreshold'),
      initialPrice: amountField(req, 'initialPrice'),
    });
    res.status(201).json({ data: serializeMarket(market) });
  } catch (error) {
    next(error);
  }
};

export const setPrice = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const price = amountField(req, 'price');
    await adminService.setPrice(req.params.asset, price);
    res.status(200).json({ data: { asset: req.params.asset, price: formatUnits(price) } });
  } catch (error) {
    next(error);
  }
};

export const updateRates = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const market = await adminService.updateRates(
      req.params.asset,
      amountField(req, 'annualSupplyRate'),
      amountField(req, 'annualBorrowRate')
    );
    res.status(200).json({ data: serializeMarket(market) });
  } catch (error) {
    next(error);
  }
};

export const setPaused = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const paused = booleanField(req, 'paused');
    await adminService.setPaused(paused);
    res.status(200).json({ data: { paused } });
  } catch (error) {
    next(error);
  }
};

export const creditWallet = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { account } = req.params;
    const asset = stringField(req, 'asset');
    const balance = await adminService.creditWallet(account, asset, amountField(req, 'amount'));
    res.status(200).json({ data: { account, asset, balance: formatUnits(balance) } });
  } catch (error) {
    next(error);
  }
};
